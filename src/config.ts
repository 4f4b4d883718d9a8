import { loadConfig } from "c12";
import { z } from "zod";
import type { FmtguardConfig } from "./types.js";

/** Language tags accepted by `--show-lang`. Data may use any tag. */
export const SUPPORTED_LANGUAGES = [
  "en-US",
  "de-DE",
  "fr-FR",
  "nl-NL",
  "it-IT",
  "es-ES",
  "pt-BR",
  "pl-PL",
  "tr-TR",
  "ar-001",
  "zh-Hans",
  "zh-Hant",
  "hi-Latn",
  "vi-VN",
  "th-TH",
  "id-ID",
  "cs-CZ",
] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

const configSchema = z.object({
  index: z.string().min(1).default("index.json"),
  include: z.array(z.string().min(1)).min(1).optional(),
  exclude: z.array(z.string().min(1)).optional(),
  referenceLanguage: z.string().min(1).default("en-US"),
  showLang: z.enum(SUPPORTED_LANGUAGES).optional(),
  warningsAsErrors: z.boolean().default(false),
  displayLimit: z.number().int().min(0).default(10),
  preview: z
    .object({
      enabled: z.boolean().default(false),
      output: z.string().min(1).default("preview.html"),
    })
    .default({}),
});

export type FmtguardUserConfig = z.input<typeof configSchema>;

export function defineConfig(config: FmtguardUserConfig) {
  return config;
}

export function parseConfig(raw: unknown): FmtguardConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config:\n${errors}`);
  }
  return result.data;
}

/**
 * Load `fmtguard.config.*` (or `.fmtguardrc`, or the `fmtguard` key of
 * package.json) and apply command-line overrides on top. Every key has a
 * default, so running without a config file is fine.
 */
export async function loadFmtguardConfig(
  overrides: FmtguardUserConfig = {},
  cwd: string = process.cwd(),
): Promise<FmtguardConfig> {
  const { config } = await loadConfig<FmtguardUserConfig>({
    name: "fmtguard",
    cwd,
    packageJson: true,
  });
  const fromFile: FmtguardUserConfig = config ?? {};

  return parseConfig({
    ...fromFile,
    ...overrides,
    preview: { ...fromFile.preview, ...overrides.preview },
  });
}
