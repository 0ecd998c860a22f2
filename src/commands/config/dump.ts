import { blue } from "ansis";
import { BaseCommand } from "../../lib/commands/base-command";

export default class ConfigDump extends BaseCommand {
  static override description = "Print the resolved configuration as YAML, token redacted.";
  static override examples = [
    "<%= config.bin %> <%= command.id %>",
    "<%= config.bin %> <%= command.id %> --config ./team.yaml --concurrency 4"
  ];

  async run(): Promise<void> {
    this.log(blue("Loaded Configuration:"));
    this.log(this.settings.toYaml());
  }
}
