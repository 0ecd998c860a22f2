import { Flags } from "@oclif/core";
import { z } from "zod";
import { DEFAULT_BASE_URL } from "../coda/http";
import { pageExportFormatSchema } from "../coda/types";

// @mark Command Configuration Definitions

/**
 * One configuration option: where it is read from and how it is validated.
 */
export interface ConfigOption {
  /** The name of the option, shared by the flag, the YAML key and the resolved config. */
  name: string;
  /** Environment variables read for this option, in order of preference. */
  variants: string[];
  /** The oclif flag definition. Flags carry no defaults so they never mask the file or environment. */
  flag: unknown;
  /** A function that returns the Zod schema for validating this option, defaults included. */
  schema: () => z.ZodTypeAny;
}

const createDefinitions = <T extends Record<string, ConfigOption>>(defs: T): T => defs;

const TRUE_VALUES = ["true", "1", "yes"];
const FALSE_VALUES = ["false", "0", "no"];

/**
 * Environment values arrive as strings; accept `true/1/yes` and `false/0/no`.
 */
export const toBoolean = (value: unknown): unknown => {
  if (typeof value !== "string") {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  return value;
};

/**
 * Splits a comma separated string; arrays pass through.
 */
export const toList = (value: unknown): unknown =>
  typeof value === "string"
    ? value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    : value;

const boolean = (fallback: boolean) => z.preprocess(toBoolean, z.boolean()).default(fallback);

const milliseconds = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

export const definitions = createDefinitions({
  token: {
    name: "token",
    variants: ["CODA_API_TOKEN"],
    flag: Flags.string({
      description: "Coda API token."
    }),
    schema: () => z.string().trim().optional()
  },
  "token-file": {
    name: "token-file",
    variants: ["CODA_API_TOKEN_FILE"],
    flag: Flags.string({
      description: "File holding the Coda API token; used when no token is given."
    }),
    schema: () => z.string().optional()
  },
  "base-url": {
    name: "base-url",
    variants: ["CODA_API_BASE_URL"],
    flag: Flags.string({
      description: "Base URL of the Coda API."
    }),
    schema: () => z.string().url().default(DEFAULT_BASE_URL)
  },
  output: {
    name: "output",
    variants: ["OUTPUT_DIR", "CODA_EXPORT_OUTPUT"],
    flag: Flags.string({
      char: "o",
      description: "Directory that receives coda-export/ and coda-export.zip."
    }),
    schema: () => z.string().min(1).default("output")
  },
  docs: {
    name: "docs",
    variants: ["CODA_EXPORT_DOCS"],
    flag: Flags.string({
      char: "d",
      description: "Comma-separated doc ids or names to export. All docs when omitted."
    }),
    schema: () => z.preprocess(toList, z.array(z.string())).default([])
  },
  formats: {
    name: "formats",
    variants: ["CODA_EXPORT_FORMATS"],
    flag: Flags.string({
      char: "f",
      description: "Comma-separated page export formats (markdown, html)."
    }),
    schema: () => z.preprocess(toList, z.array(pageExportFormatSchema).min(1)).default(["markdown", "html"])
  },
  concurrency: {
    name: "concurrency",
    variants: ["CODA_EXPORT_CONCURRENCY"],
    flag: Flags.integer({
      char: "c",
      description: "Number of docs exported in parallel."
    }),
    schema: () => z.coerce.number().int().min(1).default(2)
  },
  retries: {
    name: "retries",
    variants: ["CODA_EXPORT_RETRIES"],
    flag: Flags.integer({
      description: "Maximum retries of a request after a transient failure."
    }),
    schema: () => z.coerce.number().int().nonnegative().default(3)
  },
  "rate-limit-delay": {
    name: "rate-limit-delay",
    variants: ["CODA_EXPORT_RATE_LIMIT_DELAY"],
    flag: Flags.integer({
      description: "Minimum milliseconds between two requests."
    }),
    schema: () => milliseconds(100)
  },
  "poll-interval": {
    name: "poll-interval",
    variants: ["CODA_EXPORT_POLL_INTERVAL"],
    flag: Flags.integer({
      description: "Milliseconds between page export status polls."
    }),
    schema: () => z.coerce.number().int().min(1).default(3_000)
  },
  "poll-timeout": {
    name: "poll-timeout",
    variants: ["CODA_EXPORT_POLL_TIMEOUT"],
    flag: Flags.integer({
      description: "Milliseconds to wait for one page export before giving up."
    }),
    schema: () => z.coerce.number().int().min(1).default(120_000)
  },
  "request-timeout": {
    name: "request-timeout",
    variants: ["CODA_EXPORT_REQUEST_TIMEOUT"],
    flag: Flags.integer({
      description: "Per-request timeout in milliseconds."
    }),
    schema: () => milliseconds(30_000)
  },
  timeout: {
    name: "timeout",
    variants: ["CODA_EXPORT_TIMEOUT"],
    flag: Flags.integer({
      description: "Max run time in seconds (0 for no limit)."
    }),
    schema: () => z.coerce.number().int().nonnegative().default(0)
  },
  archive: {
    name: "archive",
    variants: ["CODA_EXPORT_ARCHIVE"],
    flag: Flags.boolean({
      description: "Pack the export tree into coda-export.zip.",
      allowNo: true
    }),
    schema: () => boolean(true)
  },
  verbose: {
    name: "verbose",
    variants: ["VERBOSE"],
    flag: Flags.boolean({
      char: "v",
      description: "Enable verbose logging."
    }),
    schema: () => boolean(false)
  }
});

/**
 * Flags shared by every command: one per definition plus the file they are read from.
 */
export const commandFlags = {
  config: Flags.string({
    description: "YAML configuration file (defaults to ./coda-export.yaml)."
  }),
  token: definitions.token.flag,
  "token-file": definitions["token-file"].flag,
  "base-url": definitions["base-url"].flag,
  output: definitions.output.flag,
  docs: definitions.docs.flag,
  formats: definitions.formats.flag,
  concurrency: definitions.concurrency.flag,
  retries: definitions.retries.flag,
  "rate-limit-delay": definitions["rate-limit-delay"].flag,
  "poll-interval": definitions["poll-interval"].flag,
  "poll-timeout": definitions["poll-timeout"].flag,
  "request-timeout": definitions["request-timeout"].flag,
  timeout: definitions.timeout.flag,
  archive: definitions.archive.flag,
  verbose: definitions.verbose.flag
};
