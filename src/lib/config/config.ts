import yaml from "yaml";
import { ConfigurationError } from "../../shared/errors";
import type { ResolvedConfig } from "./loader";

export const REDACTED = "redacted";

export class Config {
  private readonly config: ResolvedConfig;

  constructor(config: ResolvedConfig) {
    this.config = config;
  }

  get rendered(): ResolvedConfig {
    return this.config;
  }

  /**
   * The API token. Missing tokens are fatal before any request is made.
   */
  get token(): string {
    if (!this.config.token) {
      throw new ConfigurationError("No API token configured; set CODA_API_TOKEN, --token or --token-file");
    }
    return this.config.token;
  }

  /**
   * Renders the configuration with the token redacted.
   */
  toYaml(): string {
    return yaml.stringify({ ...this.config, token: this.config.token ? REDACTED : undefined });
  }
}
