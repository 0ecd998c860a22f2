import { Command, Flags } from "@oclif/core";
import * as fs from "fs/promises";
import path from "path";
import { writeFileAtomic } from "../../infrastructure/filesystem";
import { CONFIG_FILE, defaultConfigYaml } from "../../lib/config/loader";

export default class Init extends Command {
  static override description = "Write a configuration file with every option at its default.";
  static override examples = [
    "<%= config.bin %> <%= command.id %>",
    "<%= config.bin %> <%= command.id %> --output ./team.yaml --force"
  ];

  static override flags = {
    output: Flags.string({
      char: "o",
      description: "Output path for the configuration file",
      default: `./${CONFIG_FILE}`
    }),
    force: Flags.boolean({
      char: "f",
      description: "Overwrite existing configuration file",
      default: false
    })
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Init);
    const target = path.resolve(flags.output);

    const exists = await fs.access(target).then(
      () => true,
      () => false
    );
    if (exists && !flags.force) {
      this.error(`Configuration file already exists at ${flags.output}. Use --force to overwrite.`);
    }

    await writeFileAtomic(target, defaultConfigYaml());
    this.log(`✅ Configuration file created at: ${flags.output}`);
    this.log("Replace the token placeholder, or remove it and set CODA_API_TOKEN instead.");
  }
}
