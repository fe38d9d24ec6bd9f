#!/usr/bin/env tsx
import { cac } from "cac";
import { OutreachModule } from "../modules/outreach";

const cli = cac("scout");

cli.option("--data-dir <path>", "Data directory (default: ~/.config/outreach-scout)");

new OutreachModule().registerCommands(cli);

cli.help();
cli.version("0.1.0");

cli.parse(process.argv, { run: false });

try {
  await cli.runMatchedCommand();
} catch (err) {
  console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
