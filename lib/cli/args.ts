/**
 * Command line argument parsing for the `lambda` CLI.
 *
 * @module
 */
import { DEFAULT_MAX_STEPS, DEFAULT_STRATEGY } from "../evaluator/defaults.ts";
import { parseStrategy, type Strategy } from "../evaluator/strategy.ts";

export interface CLIOptions {
  help: boolean;
  version: boolean;
  json: boolean;
  trace: boolean;
  strict: boolean;
  strategy: Strategy;
  maxSteps: number;
}

export type ParsedArgs =
  | { ok: true; options: CLIOptions; expression?: string }
  | { ok: false; error: string };

export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: CLIOptions = {
    help: false,
    version: false,
    json: false,
    trace: false,
    strict: false,
    strategy: DEFAULT_STRATEGY,
    maxSteps: DEFAULT_MAX_STEPS,
  };
  const words: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
      case "--json":
        options.json = true;
        break;
      case "--trace":
      case "-t":
        options.trace = true;
        break;
      case "--strict":
        options.strict = true;
        break;
      case "--strategy":
      case "-s": {
        const value = args[++i];
        if (value === undefined) {
          return { ok: false, error: `${arg} requires a value` };
        }
        const strategy = parseStrategy(value);
        if (strategy === null) {
          return { ok: false, error: `unknown strategy: ${value}` };
        }
        options.strategy = strategy;
        break;
      }
      case "--max-steps":
      case "-n": {
        const value = args[++i];
        if (value === undefined) {
          return { ok: false, error: `${arg} requires a value` };
        }
        if (!/^[0-9]+$/.test(value)) {
          return {
            ok: false,
            error: `max steps must be a non-negative integer: ${value}`,
          };
        }
        options.maxSteps = Number(value);
        break;
      }
      case "--":
        words.push(...args.slice(i + 1));
        i = args.length;
        break;
      default:
        if (arg.startsWith("-") && arg.length > 1) {
          return { ok: false, error: `unknown option: ${arg}` };
        }
        words.push(arg);
        break;
    }
  }

  // an unquoted expression arrives as several words
  const expression = words.join(" ").trim();
  return expression.length > 0
    ? { ok: true, options, expression }
    : { ok: true, options };
}

export const USAGE = `
USAGE:
    lambda [OPTIONS] <expression>    # reduce one expression and exit
    lambda [OPTIONS]                 # start the interactive REPL

OPTIONS:
    -s, --strategy <name>   normal | applicative | name | value (default: normal)
    -n, --max-steps <n>     step budget (default: ${DEFAULT_MAX_STEPS})
    -t, --trace             print every reduction step
        --json              print the reduction result as JSON
        --strict            reject characters outside the grammar
    -h, --help              show this help message
    -v, --version           show version information

EXAMPLES:
    lambda "(\\x.\\y.x) a b"
    lambda -s applicative -n 20 --trace "(\\x.x x) (\\x.x x)"
`;
