import {
  LineTableLocator,
  RecordingDebugInfoBackend,
  debugInfoPipeline,
} from "@dbgscope/compiler/debuginfo/index.js";
import type { Diagnostic } from "@dbgscope/compiler/diagnostics/index.js";
import { DiagnosticError } from "@dbgscope/compiler/diagnostics/index.js";
import { getConfig, type DbgscopeConfig } from "./config/index.js";
import { checkScopeMapCoverage } from "./coverage.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { InputError, loadFunctionInput } from "./input.js";
import {
  mirScopeIds,
  printJson,
  scopeMapIds,
  type ScopeReport,
} from "./output.js";

type CliSession = {
  config: DbgscopeConfig;
  /** Source texts of the loaded input, for diagnostic snippets. */
  files: Record<string, string>;
};

export const exec = (config: DbgscopeConfig = getConfig()) => {
  const session: CliSession = { config, files: {} };
  return main(session).catch((error: unknown) => errorHandler(error, session));
};

async function main(session: CliSession) {
  const { config } = session;
  const input = loadFunctionInput(config.input);
  session.files = input.files;

  const backend = new RecordingDebugInfoBackend();
  const result = debugInfoPipeline({
    fn: input.fn,
    ctx: { backend, locator: new LineTableLocator(input.files) },
    debugInfo: input.debugInfo,
    defMap: input.defMap,
    mir: input.mir,
    resolveMirScopes: config.emit.includes("mir-scopes"),
  });

  const report: ScopeReport = {
    function: input.fn.name,
    debugInfo: input.debugInfo,
  };

  if (config.emit.includes("scope-map") && result.scopeMap) {
    report.scopeMap = scopeMapIds(result.scopeMap);
  }

  if (config.emit.includes("scope-tree")) {
    report.scopeTree = backend.tree();
  }

  if (result.mirScopes) {
    report.mirScopes = mirScopeIds(result.mirScopes);
  }

  if (config.verifyCoverage && result.scopeMap) {
    report.coverage = checkScopeMapCoverage({
      fn: input.fn,
      defMap: input.defMap,
      scopeMap: result.scopeMap,
    });
  }

  printJson(report);

  if (report.coverage && !report.coverage.complete) {
    console.error(
      `${input.fn.name}: scope map does not cover the function (missing: [${report.coverage.missing.join(", ")}], unexpected: [${report.coverage.unexpected.join(", ")}])`,
    );
    process.exitCode = 1;
  }
}

function errorHandler(error: unknown, { config, files }: CliSession) {
  const diagnostic = extractDiagnostic(error);
  if (diagnostic) {
    console.error(
      formatCliDiagnostic(diagnostic, { color: config.color, sources: files }),
    );
    process.exit(1);
  }

  if (error instanceof InputError) {
    console.error(`invalid input ${config.input}: ${error.message}`);
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}

const extractDiagnostic = (error: unknown): Diagnostic | undefined =>
  error instanceof DiagnosticError ? error.diagnostic : undefined;
