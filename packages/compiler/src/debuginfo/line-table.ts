import type { SourceLocation, SourceLocator } from "./backend.js";
import type { SourceSpan } from "./ids.js";

const createLineStarts = (source: string): number[] => {
  const starts = [0];
  for (let i = 0; i < source.length; i += 1) {
    if (source[i] === "\n") {
      starts.push(i + 1);
    }
  }
  return starts;
};

/** Index of the last line start at or before `index`. */
const lineIndexFor = (starts: readonly number[], index: number): number => {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((starts[mid] ?? 0) <= index) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low;
};

export class LineTable {
  readonly #starts: number[];
  readonly length: number;

  constructor(source: string) {
    this.#starts = createLineStarts(source);
    this.length = source.length;
  }

  get lineCount(): number {
    return this.#starts.length;
  }

  position(index: number): { line: number; column: number } {
    const bounded = Math.min(Math.max(index, 0), this.length);
    const line = lineIndexFor(this.#starts, bounded);
    return { line: line + 1, column: bounded - (this.#starts[line] ?? 0) };
  }
}

/** Resolves span offsets against in-memory source texts keyed by file path. */
export class LineTableLocator implements SourceLocator {
  readonly #tables = new Map<string, LineTable>();

  constructor(files: Readonly<Record<string, string>> = {}) {
    Object.entries(files).forEach(([file, source]) =>
      this.addFile(file, source),
    );
  }

  addFile(file: string, source: string): void {
    this.#tables.set(file, new LineTable(source));
  }

  spanStart(span: SourceSpan): SourceLocation {
    const table = this.#tables.get(span.file);
    if (!table) {
      throw new Error(`no source text registered for ${span.file}`);
    }
    return { file: span.file, ...table.position(span.start) };
  }
}
