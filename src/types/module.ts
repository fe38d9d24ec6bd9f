import type { CAC } from "cac";

export interface CliModule {
  name: string;
  registerCommands(cli: CAC): void;
}
