import { existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

export const CONFIG_FILE_NAME = "sqlshell.json";

export function getConfigCandidates(): string[] {
  const home = homedir();
  const paths: string[] = [];

  if (process.env.XDG_CONFIG_HOME) {
    paths.push(join(process.env.XDG_CONFIG_HOME, CONFIG_FILE_NAME));
  }

  paths.push(
    join(home, ".config", CONFIG_FILE_NAME),
    join(home, `.${CONFIG_FILE_NAME}`),
  );

  return paths;
}

export function findConfigFile(): string | null {
  for (const p of getConfigCandidates()) {
    if (existsSync(p)) return p;
  }
  return null;
}

/** Default history file, shared by every connection without its own. */
export function getDefaultHistoryPath(): string {
  return join(homedir(), ".sqlshell-history");
}
