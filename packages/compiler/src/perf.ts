type CompilerPerfCounterSnapshot = Map<string, number>;

type DebugInfoPerfSummary = {
  functionName: string;
  success: boolean;
  counters: Readonly<Record<string, number>>;
  diagnostics: number;
};

const COMPILER_PERF_ENV = "DBGSCOPE_COMPILER_PERF";

const readPerfEnv = (): string | undefined => process.env[COMPILER_PERF_ENV];

export const parsePerfFlag = (raw: string | undefined): boolean => {
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

const PERF_ENABLED = parsePerfFlag(readPerfEnv());

const counters = new Map<string, number>();

const toSortedRecord = (
  entries: ReadonlyMap<string, number>,
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries()).sort(([left], [right]) =>
      left.localeCompare(right),
    ),
  );

export const isCompilerPerfEnabled = (): boolean => PERF_ENABLED;

export const incrementCompilerPerfCounter = (
  name: string,
  amount = 1,
): void => {
  if (!PERF_ENABLED || amount === 0) {
    return;
  }
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

export const snapshotCompilerPerfCounters = (): CompilerPerfCounterSnapshot =>
  PERF_ENABLED ? new Map(counters) : new Map();

export const diffCompilerPerfCounters = ({
  before,
  after,
}: {
  before: ReadonlyMap<string, number>;
  after: ReadonlyMap<string, number>;
}): Record<string, number> => {
  if (!PERF_ENABLED) {
    return {};
  }

  const keys = new Set<string>([...before.keys(), ...after.keys()]);
  const delta = new Map<string, number>();
  keys.forEach((key) => {
    const diff = (after.get(key) ?? 0) - (before.get(key) ?? 0);
    if (diff !== 0) {
      delta.set(key, diff);
    }
  });
  return toSortedRecord(delta);
};

export const logCompilerPerfSummary = ({
  functionName,
  success,
  counters,
  diagnostics,
}: DebugInfoPerfSummary): void => {
  if (!PERF_ENABLED) {
    return;
  }

  const summary = { functionName, success, diagnostics, counters };
  console.error(`[dbgscope:debuginfo:perf] ${JSON.stringify(summary)}`);
};
