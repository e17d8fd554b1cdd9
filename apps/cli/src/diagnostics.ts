import { readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import type {
  Diagnostic,
  DiagnosticSeverity,
  SourceSpan,
} from "@dbgscope/compiler/diagnostics/index.js";
import { LineTable } from "@dbgscope/compiler/debuginfo/line-table.js";

type Position = { index: number; line: number; column: number };

type SpanContext = {
  path: string;
  start: Position;
  end: Position;
  lineText?: string;
};

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

export type CliDiagnosticOptions = {
  color?: boolean;
  /** Source texts by span file; files not listed are read from disk. */
  sources?: Readonly<Record<string, string>>;
};

const clampIndex = (value: number, max: number): number => {
  if (value < 0) return 0;
  if (value > max) return max;
  return value;
};

const positionAt = (table: LineTable, index: number): Position => ({
  index,
  ...table.position(index),
});

const lineTextAt = ({
  source,
  lineNumber,
}: {
  source: string;
  lineNumber: number;
}): string | undefined => source.split("\n")[lineNumber - 1];

const readSource = (
  span: SourceSpan,
  sources: Readonly<Record<string, string>>,
): { path: string; source: string } | undefined => {
  const inline = sources[span.file];
  if (inline !== undefined) {
    return { path: span.file, source: inline };
  }

  const path = isAbsolute(span.file) ? span.file : resolve(span.file);
  try {
    return { path, source: readFileSync(path, "utf8") };
  } catch {
    return undefined;
  }
};

const resolveSpanContext = (
  span: SourceSpan,
  sources: Readonly<Record<string, string>>,
): SpanContext | undefined => {
  const loaded = readSource(span, sources);
  if (!loaded) return undefined;

  const { path, source } = loaded;
  const table = new LineTable(source);
  const boundedStart = clampIndex(span.start, source.length);
  const boundedEnd = clampIndex(span.end, source.length);
  const start = positionAt(table, boundedStart);
  const end = positionAt(table, Math.max(boundedEnd, boundedStart));
  const lineText = lineTextAt({ source, lineNumber: start.line });

  return { path, start, end, lineText };
};

const colorForSeverity = (
  severity: DiagnosticSeverity,
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

const formatSnippet = ({
  diagnostic,
  span,
  color,
}: {
  diagnostic: Diagnostic;
  span: SpanContext;
  color: Colorizer;
}): string | undefined => {
  if (span.lineText === undefined) return undefined;

  const { lineText, start, end } = span;
  const lineStartIndex = start.index - start.column;
  const lineEndIndex = lineStartIndex + lineText.length;
  const highlightStart = Math.min(
    Math.max(start.index, lineStartIndex),
    lineEndIndex,
  );
  const highlightEnd = Math.min(
    Math.max(end.index, highlightStart + 1),
    lineEndIndex,
  );
  const pointerLength = Math.max(1, highlightEnd - highlightStart);
  const gutter = `${start.line}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(start.column)}${color.pointer(
    diagnostic.severity,
    "^".repeat(pointerLength),
  )}`;
  const message = color.muted(diagnostic.message);

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker} ${message}`,
  ].join("\n");
};

const formatLocation = ({
  span,
  context,
}: {
  span: SourceSpan;
  context?: SpanContext;
}): string => {
  if (context) {
    return `${context.path}:${context.start.line}:${context.start.column + 1}`;
  }
  const path = isAbsolute(span.file) ? span.file : resolve(span.file);
  return `${path}:${span.start}-${span.end}`;
};

const formatHints = (diagnostic: Diagnostic, color: Colorizer): string[] =>
  (diagnostic.hints ?? []).map(
    (hint) => `${color.accent("hint")}: ${hint.message}`,
  );

export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: CliDiagnosticOptions = {},
): string => {
  const color = createColorizer(options.color ?? true);
  const context = resolveSpanContext(diagnostic.span, options.sources ?? {});
  const location = formatLocation({ span: diagnostic.span, context });
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${location} ${color.severityLabel(
    diagnostic.severity,
  )}${phase} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;
  const snippet = context
    ? formatSnippet({ diagnostic, span: context, color })
    : undefined;

  return [header, snippet, ...formatHints(diagnostic, color)]
    .filter((line): line is string => Boolean(line))
    .join("\n");
};
