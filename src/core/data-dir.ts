import { existsSync, mkdirSync } from "fs";
import { join } from "path";
import { homedir } from "os";

const DEFAULT_DATA_DIR = join(homedir(), ".config", "outreach-scout");

function dataDirFromArgv(argv: string[]): string | undefined {
  const inline = argv.find(arg => arg.startsWith("--data-dir="));
  if (inline) return inline.slice("--data-dir=".length);
  const flag = argv.indexOf("--data-dir");
  return flag >= 0 ? argv[flag + 1] : undefined;
}

export function getDataDir(): string {
  const customDir = process.env.OUTREACH_DATA_DIR || dataDirFromArgv(process.argv);

  const dataDir = customDir || DEFAULT_DATA_DIR;

  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
    console.log(`📁 Created data directory: ${dataDir}`);
  }

  return dataDir;
}

export function getDbPath(): string {
  return join(getDataDir(), "outreach.db");
}

export function getConfigPath(): string {
  return join(getDataDir(), "outreach.json");
}
