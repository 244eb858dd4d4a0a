#!/usr/bin/env node
import { Command } from "commander";
import { compile } from "./compiler.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { tokenToString } from "./lexer/tokens.js";
import { readSource, resolveSourceFile } from "./source.js";

interface CliOptions {
  displayTokens?: boolean;
  displayAst?: boolean;
}

const program = new Command()
  .name("o2c")
  .description("Oxygen compiler front end: tokenizes and parses .o2 source files")
  .version("0.1.0")
  .argument("[file]", "the .o2 file to compile (defaults to the single .o2 file in the current directory)")
  .option("--display-tokens", "Display the tokens representing the input file")
  .option("--display-ast", "Display the syntax tree of the input file as JSON")
  .action(async (file: string | undefined, opts: CliOptions) => {
    try {
      file = await resolveSourceFile(file);
      const source = await readSource(file);
      const result = compile(source, file, { emitTokens: !!opts.displayTokens && !opts.displayAst });

      if (result.errors.length > 0) {
        console.error(formatDiagnostics(result.errors));
        process.exit(1);
      }

      if (opts.displayTokens && result.tokens) {
        for (const tok of result.tokens) {
          console.log(tokenToString(tok));
        }
      }

      if (opts.displayAst && result.program) {
        console.log(JSON.stringify(result.program, null, 2));
      }
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

await program.parseAsync();
