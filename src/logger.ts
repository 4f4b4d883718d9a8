import pc from "picocolors";
import { formatDiagnostic } from "./reporter.js";
import type { Diagnostic } from "./types.js";
import type { LanguageProgress, ValidationSummary } from "./validator.js";

const SEVERITY_COLORS: Record<Diagnostic["severity"], (text: string) => string> = {
  warning: pc.yellow,
  error: pc.red,
  fatal: (text) => pc.bold(pc.red(text)),
};

export function logStart(fileCount: number, referenceLanguage: string): void {
  console.log(
    `\n${pc.bold("fmtguard")} ${pc.dim("·")} ${fileCount} ${fileCount === 1 ? "file" : "files"} ${pc.dim("·")} reference ${referenceLanguage}\n`,
  );
}

export function logDiagnostic(diagnostic: Diagnostic): void {
  console.log(SEVERITY_COLORS[diagnostic.severity](formatDiagnostic(diagnostic)));
  console.log();
}

export function logProgressSummary(progress: LanguageProgress): void {
  console.log(
    `Total missing translations for '${progress.language}': ${progress.missing}. ` +
      `Progress: ${progress.translated}/${progress.total} (${progress.percent}%)`,
  );
}

export function logSummary(summary: ValidationSummary): void {
  if (summary.counts.fatal > 0) {
    console.log(pc.bold(pc.red(`Fatal errors: ${summary.counts.fatal}`)));
  }
  if (summary.counts.error > 0) {
    console.log(pc.red(`Errors: ${summary.counts.error}`));
  }
  if (summary.counts.warning > 0) {
    console.log(pc.yellow(`Warnings: ${summary.counts.warning}`));
  }
  if (summary.exitCode === 0) {
    console.log(pc.green("No errors found"));
  }
}

export function logSuccess(message: string): void {
  console.log(`${pc.green("✔")} ${message}`);
}

export function logWarning(message: string): void {
  console.log(`${pc.yellow("⚠")} ${message}`);
}

export function logVerbose(message: string, verbose: boolean): void {
  if (verbose) {
    console.log(pc.dim(`  ${message}`));
  }
}
