import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";

export function formatDiagnostic(diag: Diagnostic): string {
  const { start, end } = diag.span;
  const lineNum = String(start.line);
  const padding = " ".repeat(lineNum.length);
  const width = Math.max(1, end.column - start.column);

  let output = `${chalk.red.bold("error")}: ${chalk.bold(diag.message)}\n`;
  output += `${padding} ${chalk.blue("-->")} ${diag.span.source}:${start.line}:${start.column}\n`;
  output += `${padding} ${chalk.blue("|")}\n`;
  output += `${chalk.blue(lineNum)} ${chalk.blue("|")} ${diag.lineText}\n`;
  output += `${padding} ${chalk.blue("|")} ${" ".repeat(start.column - 1)}${chalk.red("^".repeat(width))}\n`;

  if (diag.help) {
    output += `${padding} ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(d)).join("\n");
}
