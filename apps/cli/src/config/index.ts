import { getConfigFromCli } from "./arg-parser.js";
import type { DbgscopeConfig } from "./types.js";

export type { DbgscopeConfig, EmitTarget } from "./types.js";

let config: DbgscopeConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
