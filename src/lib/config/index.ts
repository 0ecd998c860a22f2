export { Config, REDACTED } from "./config";
export { commandFlags, definitions, toBoolean, toList } from "./definitions";
export type { ConfigOption } from "./definitions";
export {
  CONFIG_FILE,
  configSchema,
  defaultConfigYaml,
  fromEnvironment,
  loadCommandConfig,
  TOKEN_PLACEHOLDER
} from "./loader";
export type { LoadOptions, ResolvedConfig } from "./loader";
