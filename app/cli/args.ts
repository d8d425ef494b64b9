import path from "node:path";
import process from "node:process";

export interface CliOptions {
  configPath?: string;
  commandsPath?: string;
  seed?: number | string;
  quiet?: boolean;
  trace?: boolean;
}

export function printUsage(scriptPath: string = process.argv[1] ?? "main.ts"): void {
  const scriptName = path.basename(scriptPath);
  console.log(
    [
      `Usage: ${scriptName} [<commands-file>] [--config <config.json>] [--seed <value>]`,
      "       [--quiet] [--trace]",
      "",
      "Without a commands file the session reads commands from the terminal.",
      "",
      "Examples:",
      `  ${scriptName} --seed 7`,
      `  ${scriptName} session.txt --config letterwire.config.json --trace`
    ].join("\n")
  );
}

export const HELP_BANNER = [
  "Commands:",
  '  "<notation>"                       save a notation, e.g. "ab(cd) ef"',
  "  PLAY                               build and play the saved notation",
  "  PAUSE                              stop all sound, keep the notation",
  "  SET <letter> <type> [<name> <value>]...   bind a letter",
  "  SET <letter> <name> <value>...     change a bound letter's parameters",
  "  PRINT | PRINT v                    list bindings (v: with values)",
  "  EXIT                               quit",
  "Types: sin square saw triangle noise filter delay reverb midi"
].join("\n");

function parseSeed(raw: string | undefined): number | string | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const numeric = Number(raw);
  return raw.trim().length > 0 && Number.isInteger(numeric) ? numeric : raw;
}

export function parseArgs(argv: readonly string[]): CliOptions | "help" {
  const options: CliOptions = {};

  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];
    switch (arg) {
      case "--config": {
        options.configPath = argv[++index];
        break;
      }
      case "--seed": {
        options.seed = parseSeed(argv[++index]);
        break;
      }
      case "--quiet": {
        options.quiet = true;
        break;
      }
      case "--trace": {
        options.trace = true;
        break;
      }
      case "--help":
      case "-h": {
        return "help";
      }
      default: {
        if (!options.commandsPath && !arg.startsWith("-")) {
          options.commandsPath = arg;
        } else {
          console.warn(`Unknown argument: ${arg}`);
        }
        break;
      }
    }
  }

  return options;
}
