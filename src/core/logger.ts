import chalk from "chalk";

/** Console output. Errors go to stderr, everything else to stdout. */
export const logger = {
  log: (msg = "") => console.log(msg),
  success: (msg: string) => console.log(chalk.green("✓"), msg),
  warn: (msg: string) => console.log(chalk.yellow("Warning:"), msg),
  error: (msg: string) => console.error(chalk.red("Error:"), msg),
  dim: (msg: string) => console.log(chalk.dim(msg)),
};
