export { defineConfig, SUPPORTED_LANGUAGES } from "./config.js";
export { tokenize, joinTokens, findShortFormats, findVariables } from "./tokenizer.js";
export { classifyDirective, rewriteShorthand, rewriteText } from "./grammar.js";
export { renderRuns, applyDirective, initialStyle } from "./styles.js";
export { extractSignature } from "./signature.js";
export { findTranslationIssues, checkTranslation } from "./checks.js";
export { createReporter, formatDiagnostic, formatLocation } from "./reporter.js";
export {
  checkDocument,
  checkFile,
  checkFiles,
  checkSource,
  createValidationContext,
  summarize,
} from "./validator.js";
export { parseXml, XmlParseError } from "./xml/parser.js";
export { createPreviewDocument, runsToHtml } from "./preview.js";
export type { Directive, DirectiveKind } from "./grammar.js";
export type { Token } from "./tokenizer.js";
export type { StyledRun, TextRun, StyleState } from "./styles.js";
export type { FormattingSignature } from "./signature.js";
export type { FmtguardUserConfig } from "./config.js";
export type {
  Diagnostic,
  DiagnosticLocation,
  Entry,
  FmtguardConfig,
  Severity,
  SourcePosition,
  Translation,
} from "./types.js";
export type { ValidationContext, ValidationOptions, ValidationSummary } from "./validator.js";
