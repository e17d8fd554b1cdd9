import { Command } from "commander";
import { createRequire } from "node:module";
import type { DbgscopeConfig, EmitTarget } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

type CliOptions = {
  emitScopeMap?: boolean;
  emitScopeTree?: boolean;
  emitMirScopes?: boolean;
  verifyCoverage?: boolean;
  color: boolean;
};

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command");

const selectedTargets = (opts: CliOptions): EmitTarget[] => {
  const targets: EmitTarget[] = [];
  if (opts.emitScopeMap) targets.push("scope-map");
  if (opts.emitScopeTree) targets.push("scope-tree");
  if (opts.emitMirScopes) targets.push("mir-scopes");
  return targets.length > 0 ? targets : ["scope-map"];
};

export const getConfigFromCli = (): DbgscopeConfig => {
  const program = createBaseCommand({
    name: "dbgscope",
    description: "Compute lexical debug scopes for a function body",
  });

  program
    .argument("[input]", "JSON function description (default: ./function.json)")
    .option("--emit-scope-map", "write the node id to scope id map to stdout")
    .option("--emit-scope-tree", "write the created scope tree to stdout")
    .option("--emit-mir-scopes", "write the resolved MIR scope table to stdout")
    .option(
      "--verify-coverage",
      "exit 1 if a reachable node is missing from the scope map",
    )
    .option("--no-color", "disable colored diagnostics");

  program.parse(process.argv);
  const opts = program.opts<CliOptions>();
  const inputArg: string | undefined = program.args[0];

  return {
    input: inputArg ?? "./function.json",
    emit: selectedTargets(opts),
    verifyCoverage: opts.verifyCoverage ?? false,
    color: opts.color,
  };
};
