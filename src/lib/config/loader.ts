import dotenv from "dotenv";
import * as fs from "fs/promises";
import path from "path";
import * as yaml from "yaml";
import { z } from "zod";
import { ConfigurationError } from "../../shared/errors";
import { log } from "../log";
import { Config } from "./config";
import { ConfigOption, definitions } from "./definitions";

export const CONFIG_FILE = "coda-export.yaml";
export const CONFIG_VARIANTS = ["CODA_EXPORT_CONFIG"];

/**
 * Token value shipped in example configuration files.
 */
export const TOKEN_PLACEHOLDER = "YOUR_API_TOKEN_HERE";

/**
 * Schema of the merged configuration.
 */
export const configSchema = z.object({
  token: definitions.token.schema(),
  "token-file": definitions["token-file"].schema(),
  "base-url": definitions["base-url"].schema(),
  output: definitions.output.schema(),
  docs: definitions.docs.schema(),
  formats: definitions.formats.schema(),
  concurrency: definitions.concurrency.schema(),
  retries: definitions.retries.schema(),
  "rate-limit-delay": definitions["rate-limit-delay"].schema(),
  "poll-interval": definitions["poll-interval"].schema(),
  "poll-timeout": definitions["poll-timeout"].schema(),
  "request-timeout": definitions["request-timeout"].schema(),
  timeout: definitions.timeout.schema(),
  archive: definitions.archive.schema(),
  verbose: definitions.verbose.schema()
});

export type ResolvedConfig = z.infer<typeof configSchema>;

export type LoadOptions = {
  /**
   * Directory holding `coda-export.yaml` and `.env`; relative paths resolve
   * against it. Defaults to the process working directory.
   */
  cwd?: string;
  /**
   * Environment to read. Defaults to `process.env`.
   */
  env?: NodeJS.ProcessEnv;
};

const fileSchema = z.record(z.unknown());

const isMissing = (error: unknown): boolean => error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Loads, merges, and validates the configuration from multiple sources.
 *
 * Later sources take precedence:
 * 1. Schema defaults
 * 2. YAML file (`coda-export.yaml`, or the file given by `--config`)
 * 3. `.env` file (never overrides the real environment)
 * 4. Environment variables
 * 5. CLI flags
 *
 * @param cliFlags The raw CLI flags from oclif's `this.parse()`.
 * @returns A validated configuration object.
 */
export async function loadCommandConfig(
  cliFlags: Record<string, unknown>,
  options: LoadOptions = {}
): Promise<Config> {
  const cwd = options.cwd ?? process.cwd();

  // 1. Environment, with .env filling the gaps
  const env: NodeJS.ProcessEnv = { ...(await readDotenv(path.join(cwd, ".env"))), ...(options.env ?? process.env) };

  // 2. Clean up CLI flags (remove undefined)
  const { config: configFlag, ...cleanedFlags } = definedEntries(cliFlags);

  // 3. Load from YAML file
  const explicitFile = typeof configFlag === "string" ? configFlag : firstVariant(env, CONFIG_VARIANTS);
  const fileConfig = explicitFile
    ? await readConfigFile(path.resolve(cwd, explicitFile), true)
    : await readConfigFile(path.join(cwd, CONFIG_FILE), false);

  // 4. Merge all sources
  const merged = {
    ...fileConfig,
    ...fromEnvironment(env),
    ...cleanedFlags
  };

  // 5. Validate
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    log.error("Configuration validation failed:");
    for (const issue of result.error.issues) {
      log.error(`- ${issue.path.join(".")}: ${issue.message}`);
    }
    throw new ConfigurationError(
      `Invalid configuration: ${result.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`).join("; ")}`
    );
  }

  // 6. Resolve the token
  return new Config({ ...result.data, token: await resolveToken(result.data, cwd) });
}

/**
 * Reads the option values present in the environment. The first variant
 * that is set wins.
 */
export const fromEnvironment = (env: NodeJS.ProcessEnv): Record<string, string> => {
  const options: ConfigOption[] = Object.values(definitions);
  const values: Record<string, string> = {};

  for (const option of options) {
    const value = firstVariant(env, option.variants);
    if (value !== undefined) {
      values[option.name] = value;
    }
  }

  return values;
};

const firstVariant = (env: NodeJS.ProcessEnv, variants: string[]): string | undefined => {
  for (const variant of variants) {
    const value = env[variant];
    if (value !== undefined && value !== "") {
      return value;
    }
  }
  return undefined;
};

const definedEntries = (values: Record<string, unknown>): Record<string, unknown> => {
  const defined: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      defined[key] = value;
    }
  }
  return defined;
};

const readDotenv = async (file: string): Promise<Record<string, string>> => {
  try {
    return dotenv.parse(await fs.readFile(file, "utf8"));
  } catch (error) {
    if (isMissing(error)) {
      return {};
    }
    throw new ConfigurationError(`Could not read ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }
};

const readConfigFile = async (file: string, required: boolean): Promise<Record<string, unknown>> => {
  let contents: string;
  try {
    contents = await fs.readFile(file, "utf8");
  } catch (error) {
    if (isMissing(error) && !required) {
      return {};
    }
    throw new ConfigurationError(`Could not read ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`Could not parse ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = fileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`${file} must contain a mapping of option names to values`);
  }

  log.debug(`Loaded configuration from ${file}`);
  return result.data;
};

/**
 * The token comes from `token`, else from the trimmed contents of
 * `token-file`. The example placeholder is never accepted.
 */
const resolveToken = async (config: ResolvedConfig, cwd: string): Promise<string | undefined> => {
  let token = config.token || undefined;

  if (!token && config["token-file"]) {
    const file = path.resolve(cwd, config["token-file"]);
    try {
      token = (await fs.readFile(file, "utf8")).trim() || undefined;
    } catch (error) {
      throw new ConfigurationError(
        `Could not read token file ${file}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  if (token === TOKEN_PLACEHOLDER) {
    throw new ConfigurationError(`The API token is still the placeholder ${TOKEN_PLACEHOLDER}`);
  }

  return token;
};

/**
 * A configuration file with every option at its default and the token
 * placeholder to fill in.
 */
export const defaultConfigYaml = (): string =>
  yaml.stringify({ token: TOKEN_PLACEHOLDER, ...configSchema.parse({}) });
