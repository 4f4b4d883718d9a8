/**
 * Pure functions extracted from cli.ts for testability.
 */
import {
  SUPPORTED_LANGUAGES,
  type FmtguardUserConfig,
  type SupportedLanguage,
} from "./config.js";

export interface CheckArgs {
  "show-lang"?: string;
  reference?: string;
  preview?: boolean;
  "preview-output"?: string;
  "warnings-as-errors"?: boolean;
  "display-limit"?: string;
}

export function isSupportedLanguage(tag: string): tag is SupportedLanguage {
  return SUPPORTED_LANGUAGES.some((language) => language === tag);
}

/** Accepts non-negative integers only; anything else throws. */
export function parseDisplayLimit(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(
      `Invalid display limit "${value}". Expected a non-negative integer.`,
    );
  }
  return Number(value);
}

/**
 * Turn parsed flags into config overrides. Flags that were not given leave
 * the config file's value in place.
 */
export function buildOverrides(args: CheckArgs): FmtguardUserConfig {
  const overrides: FmtguardUserConfig = {};

  const showLang = args["show-lang"];
  if (showLang) {
    if (!isSupportedLanguage(showLang)) {
      throw new Error(
        `Invalid language "${showLang}". Expected one of: ${SUPPORTED_LANGUAGES.join(", ")}`,
      );
    }
    overrides.showLang = showLang;
  }
  if (args.reference) overrides.referenceLanguage = args.reference;
  if (args["warnings-as-errors"]) overrides.warningsAsErrors = true;
  if (args["display-limit"] !== undefined && args["display-limit"] !== "") {
    overrides.displayLimit = parseDisplayLimit(args["display-limit"]);
  }

  const preview: { enabled?: boolean; output?: string } = {};
  if (args.preview) preview.enabled = true;
  if (args["preview-output"]) {
    preview.enabled = true;
    preview.output = args["preview-output"];
  }
  if (Object.keys(preview).length > 0) overrides.preview = preview;

  return overrides;
}
