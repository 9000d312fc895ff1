#!/usr/bin/env -S npx tsx

/**
 * Lambda calculus reducer CLI.
 *
 * One-shot usage:
 *   lambda [OPTIONS] <expression>
 *
 * Interactive usage:
 *   lambda [OPTIONS]
 *
 * Examples:
 *   lambda "(\x.\y.x) a b"                   # reduces to a
 *   lambda --json -s value "(\x.x) y"        # full result record as JSON
 */
import { hrtime } from "node:process";
import rsexport from "random-seed";
import tkexport from "terminal-kit";

import {
  analyzeTerm,
  classify,
  type LexerOptions,
  parseLambda,
  parseStrategy,
  prettyPrintUntypedLambda,
  randLambda,
  reduce,
  runReduction,
  stepOnce,
  Strategy,
  type UntypedLambda,
} from "../lib/index.ts";
import { type CLIOptions, parseArgs, USAGE } from "../lib/cli/args.ts";
import { formatResult, formatSyntaxError } from "../lib/cli/format.ts";
import { VERSION } from "../lib/shared/version.ts";

const { create } = rsexport;
const { terminal } = tkexport;

const N = 6;

function printGreen(msg: string): void {
  terminal("\n");
  terminal.green(msg + "\n");
}
function printCyan(msg: string): void {
  terminal("\n");
  terminal.cyan(msg + "\n");
}
function printYellow(msg: string): void {
  terminal("\n");
  terminal.yellow(msg + "\n");
}
function printRed(msg: string): void {
  terminal("\n");
  terminal.red(msg + "\n");
}

function runOnce(expression: string, options: CLIOptions): number {
  let term: UntypedLambda;
  try {
    term = parseLambda(expression, { strict: options.strict });
  } catch (e) {
    const lines = formatSyntaxError(expression, e);
    if (lines === null) throw e;
    console.error(lines.join("\n"));
    return 1;
  }

  const result = reduce(term, options.strategy, options.maxSteps);
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(formatResult(result, options.trace).join("\n"));
  }
  return 0;
}

class Repl {
  private current: UntypedLambda;
  private readonly history: string[] = [];

  constructor(
    private strategy: Strategy,
    private readonly maxSteps: number,
    private readonly lexerOptions: LexerOptions,
  ) {
    this.current = parseLambda("λx.x");
  }

  private setNewTerm(input: string): void {
    try {
      this.current = parseLambda(input, this.lexerOptions);
      printGreen("set new term: " + prettyPrintUntypedLambda(this.current));
    } catch (e) {
      const lines = formatSyntaxError(input, e);
      if (lines === null) throw e;
      printRed(lines.join("\n"));
    }
  }

  private step(): void {
    const result = stepOnce(this.current, this.strategy);
    if (result.altered) {
      this.current = result.expr;
      printGreen(
        `stepped: ${prettyPrintUntypedLambda(this.current)}` +
          `\n  contracted ${result.redex.redex}`,
      );
    } else {
      printYellow("no further reduction possible.");
    }
  }

  private reduceCurrent(withTrace: boolean): void {
    const { result, term } = runReduction(
      this.current,
      this.strategy,
      this.maxSteps,
    );
    this.current = term;
    printGreen(formatResult(result, withTrace).join("\n"));
  }

  private setStrategy(name: string | undefined): void {
    if (name === undefined) {
      printCyan("current strategy: " + this.strategy);
      return;
    }
    const strategy = parseStrategy(name);
    if (strategy === null) {
      printRed("unknown strategy: " + name);
      return;
    }
    this.strategy = strategy;
    printCyan("switched to " + strategy + ".");
  }

  private analyze(): void {
    const analysis = analyzeTerm(this.current);
    printCyan(
      [
        `kind:         ${analysis.kind}`,
        `free:         ${analysis.freeVariables.join(", ") || "(none)"}`,
        `bound:        ${analysis.boundVariables.join(", ") || "(none)"}`,
        `abstractions: ${analysis.abstractionCount}`,
        `applications: ${analysis.applicationCount}`,
        `variables:    ${analysis.variableCount}`,
        `depth:        ${analysis.depth}`,
      ].join("\n"),
    );
  }

  processCommand(input: string): void {
    if (input === "") return;

    if (!input.startsWith(":")) {
      // Any input that does not start with ':' is interpreted as a new term.
      this.setNewTerm(input);
      return;
    }

    const parts = input.slice(1).trim().split(/\s+/);
    const cmd = (parts[0] ?? "").toLowerCase();

    switch (cmd) {
      case "strategy":
        this.setStrategy(parts[1]);
        break;
      case "s":
      case "step":
        this.step();
        break;
      case "m":
      case "reduce":
        this.reduceCurrent(false);
        break;
      case "t":
      case "trace":
        this.reduceCurrent(true);
        break;
      case "c":
      case "classify": {
        const name = classify(this.current);
        if (name === null) {
          printYellow("not a known combinator.");
        } else {
          printGreen(name);
        }
        break;
      }
      case "a":
      case "analyze":
        this.analyze();
        break;
      case "g":
      case "generate":
        this.current = randLambda(create(hrtime.bigint().toString()), N);
        printGreen(
          "generated new term: " + prettyPrintUntypedLambda(this.current),
        );
        break;
      case "p":
      case "print":
        printGreen("term: " + prettyPrintUntypedLambda(this.current));
        break;
      case "help":
        printHelp();
        break;
      case "quit":
        printGreen("exiting REPL.");
        terminal.processExit(0);
        break;
      default:
        printYellow("unknown command: " + input);
    }
  }

  prompt(): string {
    return `\n[${this.strategy}] > `;
  }

  loop(): void {
    terminal(this.prompt());
    terminal.inputField(
      {
        history: this.history,
        autoCompleteHint: false,
        autoCompleteMenu: false,
      },
      (error: unknown, input: string | undefined) => {
        if (error) {
          printRed("error: " + String(error));
          terminal.processExit(1);
          return;
        }

        const trimmedInput = (input ?? "").trim();
        if (trimmedInput) {
          this.history.push(trimmedInput);
        }

        this.processCommand(trimmedInput);
        this.loop();
      },
    );
  }
}

function printHelp(): void {
  printGreen(`
Available commands:
  :strategy [name]      -- show or set the strategy (normal|applicative|name|value)
  :s or :step           -- contract one redex
  :m or :reduce         -- reduce to normal form (bounded)
  :t or :trace          -- reduce and print every step
  :c or :classify       -- name the current term if it is a known combinator
  :a or :analyze        -- show free/bound variables and size metrics
  :g or :generate       -- generate a random term
  :p or :print          -- print the current term
  :help                 -- display this help message
  :quit                 -- exit the REPL

Any other input is interpreted as a new term.
Press CTRL+C or type :quit to exit.`);
}

function main(): void {
  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error("Use --help for usage information.");
    process.exitCode = 2;
    return;
  }

  const { options, expression } = parsed;
  if (options.help) {
    console.log(`\nlambda v${VERSION}\n${USAGE}`);
    return;
  }
  if (options.version) {
    console.log(`lambda v${VERSION}`);
    return;
  }
  if (expression !== undefined) {
    process.exitCode = runOnce(expression, options);
    return;
  }

  terminal.on("key", (name: string) => {
    if (name === "CTRL_C") {
      printGreen("exiting REPL.");
      terminal.processExit(0);
    }
  });
  printCyan(`lambda v${VERSION}: type :help for commands.`);
  new Repl(options.strategy, options.maxSteps, { strict: options.strict }).loop();
}

main();
