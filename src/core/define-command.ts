import type { ArgumentsCamelCase, Argv, CommandModule } from "yargs";
import type { GlobalArgs } from "./types.ts";
import { logger } from "./logger.ts";
import { UserError } from "./errors.ts";

type Args<A> = ArgumentsCamelCase<GlobalArgs & A>;

interface CommandDef<A> {
  command: string;
  describe: string;
  /** Define command-specific flags and positional arguments. */
  builder: (yargs: Argv<GlobalArgs>) => Argv<GlobalArgs & A>;
  /**
   * Main command handler. Global flags (`verbose`) are always available on `args`.
   * Throw {@link UserError} to abort with a clean message.
   */
  handler: (args: Args<A>) => Promise<void>;
}

/**
 * Command factory. Wraps the handler with consistent error handling.
 *
 * Exit codes: `1` for {@link UserError}s (message and hint printed),
 * `2` for anything else (stack printed with `--verbose`).
 *
 * @example
 * ```ts
 * export const myCommand = defineCommand<{ name: string }>({
 *   command: "$0 <name>",
 *   describe: "Greet someone.",
 *   builder: (yargs) => yargs.positional("name", { type: "string", demandOption: true }),
 *   handler: async ({ name, verbose }) => {
 *     // ...
 *   },
 * });
 * ```
 */
export function defineCommand<A>(def: CommandDef<A>): CommandModule<GlobalArgs, GlobalArgs & A> {
  return {
    command: def.command,
    describe: def.describe,
    builder: def.builder,
    handler: async (args) => {
      try {
        await def.handler(args);
      } catch (err) {
        if (err instanceof UserError) {
          logger.error(err.message);
          if (err.hint) logger.dim(err.hint);
          process.exit(1);
        }

        logger.error("An unexpected error occurred.");
        if (args.verbose) console.error(err);
        process.exit(2);
      }
    },
  };
}
