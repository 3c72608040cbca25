import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { shellCommand } from "./commands/shell.ts";
import { logger } from "./core/logger.ts";
import { NAME, VERSION } from "./core/version.ts";

export const cli = yargs(hideBin(process.argv))
  .scriptName(NAME)
  .version(VERSION)

  .option("verbose", {
    alias: "v",
    type: "boolean",
    default: false,
    describe: "Enable verbose output",
    global: true,
  })

  .command(shellCommand)

  .strict()
  .fail((msg, err, yargs) => {
    if (err) {
      logger.error(err.message);
    } else if (msg) {
      logger.error(msg);
      console.log();
      yargs.showHelp();
    }
    process.exit(1);
  })
  .help()
  .alias("h", "help")
  .wrap(Math.min(120, process.stdout.columns ?? 80));
