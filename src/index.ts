#!/usr/bin/env node
import { Command } from "commander";
import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { parse, parseExpression, tokenize } from "./frontend.js";
import { printProgram } from "./ast/printer.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { Evaluator } from "./evaluator/evaluator.js";
import { EvalEnvironment, TypeEnvironment } from "./evaluator/environment.js";
import { inferType } from "./evaluator/infer.js";
import { inspect, typeOfValue, valueFromText } from "./evaluator/values.js";

async function resolveDefaultFile(file: string | undefined): Promise<string> {
  if (file) return file;
  const entries = await readdir(process.cwd());
  const found = entries.filter(f => f.endsWith(".brc"));
  if (found.length === 0) {
    throw new Error("No .brc file found in the current directory. Pass a file path explicitly.");
  }
  if (found.length > 1) {
    throw new Error(`Multiple .brc files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(process.cwd(), found[0]);
}

function parseBinding(binding: string): [string, string] {
  const eq = binding.indexOf("=");
  if (eq <= 0) {
    throw new Error(`Invalid binding '${binding}'. Use name=value.`);
  }
  return [binding.slice(0, eq), binding.slice(eq + 1)];
}

function collectBindings(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command()
  .name("bracec")
  .description("Front end for the brace scripting language: tokenize, parse and evaluate expressions")
  .version("0.1.0");

program
  .command("tokens [file]")
  .description("Print the token stream of a .brc file")
  .action(async (file: string | undefined) => {
    try {
      file = await resolveDefaultFile(file);
      const source = await readFile(file, "utf-8");
      for (const tok of tokenize(source, file)) {
        console.log(`${tok.kind}\t${JSON.stringify(tok.text)}\t${tok.span.start.line}:${tok.span.start.column}`);
      }
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("parse [file]")
  .description("Parse a .brc file and print its canonical form")
  .option("--json", "Print the AST as JSON")
  .option("--plain", "Report diagnostics without colour")
  .action(async (file: string | undefined, opts: Record<string, unknown>) => {
    try {
      file = await resolveDefaultFile(file);
      const source = await readFile(file, "utf-8");
      const result = parse(source, file);

      if (result.diagnostics.length > 0) {
        console.error(formatDiagnostics(source, result.diagnostics, { plain: !!opts.plain }));
        process.exit(1);
      }

      if (opts.json) {
        console.log(JSON.stringify(result.program, (_key, value) =>
          typeof value === "bigint" ? value.toString() : value,
          2,
        ));
        return;
      }

      process.stdout.write(printProgram(result.program));
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("eval <expression>")
  .description("Evaluate a single expression, e.g. 'typeof(x + 5)'")
  .option("-v, --var <binding>", "Bind a variable as name=value (repeatable)", collectBindings, [])
  .option("--static", "Report the inferred type without evaluating")
  .action((expression: string, opts: { var: string[]; static?: boolean }) => {
    try {
      const result = parseExpression(expression, "<eval>");
      if (!result.expression) {
        console.error(formatDiagnostics(expression, result.diagnostics));
        process.exit(1);
      }

      const values = new EvalEnvironment();
      const types = new TypeEnvironment();
      for (const binding of opts.var) {
        const [name, text] = parseBinding(binding);
        const value = values.set(name, valueFromText(text));
        types.set(name, typeOfValue(value));
      }

      if (opts.static) {
        console.log(inferType(result.expression, types));
        return;
      }

      const value = new Evaluator().evaluate(result.expression, values);
      console.log(`${inspect(value)} (${typeOfValue(value)})`);
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program.parse();
