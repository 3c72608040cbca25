import { homedir } from "node:os";
import { join } from "node:path";

const PLACEHOLDER = /\$(?:(\$)|\{([_a-zA-Z][_a-zA-Z0-9]*)\}|([_a-zA-Z][_a-zA-Z0-9]*))/g;

/**
 * Replace `$NAME` and `${NAME}` references with values from `env`.
 * Unset variables become the empty string and `$$` is a literal `$`.
 *
 * Note that `$USER_history` names the variable `USER_history`; write
 * `${USER}_history` to end the name early.
 */
export function substituteEnv(
  text: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return text.replace(PLACEHOLDER, (_match, dollar?: string, braced?: string, bare?: string) => {
    if (dollar) return "$";
    const name = braced ?? bare ?? "";
    return env[name] ?? "";
  });
}

/** Expand a leading `~` to the current user's home directory. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}
