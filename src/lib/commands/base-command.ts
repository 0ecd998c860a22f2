import { Command } from "@oclif/core";
import { AuthError, ConfigurationError } from "../../shared/errors";
import { Config } from "../config/config";
import { commandFlags } from "../config/definitions";
import { loadCommandConfig } from "../config/loader";
import { log } from "../log";

/**
 * Exit code for a rejected credential or unusable configuration.
 */
export const EXIT_FATAL = 1;

export abstract class BaseCommand extends Command {
  /**
   * Base flags available to all commands, one per configuration definition.
   */
  static baseFlags = commandFlags;

  /**
   * Configuration resolved from the file, environment and flags.
   */
  protected settings!: Config;

  public async init(): Promise<void> {
    await super.init();

    const { flags } = await this.parse({
      flags: this.ctor.flags,
      baseFlags: this.ctor.baseFlags,
      args: this.ctor.args,
      strict: this.ctor.strict
    });

    this.settings = await loadCommandConfig(flags);
    log.configure({ verbose: this.settings.rendered.verbose });
  }

  protected async catch(err: Error & { exitCode?: number }): Promise<unknown> {
    if (err instanceof ConfigurationError || err instanceof AuthError) {
      log.error(err.message);
      this.exit(EXIT_FATAL);
    }
    return super.catch(err);
  }
}
