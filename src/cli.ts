#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import { buildOverrides } from "./cli-utils.js";
import { loadFmtguardConfig, SUPPORTED_LANGUAGES } from "./config.js";
import { resolveFiles } from "./files.js";
import {
	logDiagnostic,
	logProgressSummary,
	logStart,
	logSuccess,
	logSummary,
	logVerbose,
	logWarning,
} from "./logger.js";
import { createPreviewDocument, writePreview } from "./preview.js";
import { checkFiles, createValidationContext, summarize } from "./validator.js";

const main = defineCommand({
	meta: {
		name: "fmtguard",
		version: "0.1.0",
		description:
			"Check formatting directives and placeholders in XML localization files",
	},
	args: {
		"show-lang": {
			type: "string",
			description: `Report missing translations for a language (${SUPPORTED_LANGUAGES.join(", ")})`,
		},
		reference: {
			type: "string",
			description: "Language whose strings define the expected formatting",
		},
		preview: {
			type: "boolean",
			description: "Write an HTML preview of every formatted string",
		},
		"preview-output": {
			type: "string",
			description: "Where to write the HTML preview",
		},
		"warnings-as-errors": {
			type: "boolean",
			description: "Treat spacing, punctuation and missing-language warnings as errors",
		},
		"display-limit": {
			type: "string",
			description: "How many missing-language warnings to print",
		},
		verbose: {
			type: "boolean",
			description: "Verbose output",
			default: false,
		},
	},
	async run({ args }) {
		const config = await loadFmtguardConfig(buildOverrides(args));
		const files = await resolveFiles(config, process.cwd(), args._);

		if (files.length === 0) {
			logWarning("No files to check.");
			return;
		}

		logStart(files.length, config.referenceLanguage);
		for (const file of files) logVerbose(file, args.verbose);

		const preview = config.preview.enabled ? createPreviewDocument() : undefined;
		const ctx = createValidationContext({
			referenceLanguage: config.referenceLanguage,
			showLang: config.showLang,
			warningsAsErrors: config.warningsAsErrors,
			displayLimit: config.displayLimit,
			preview,
			onDiagnostic: logDiagnostic,
		});

		await checkFiles(files, ctx);

		const summary = summarize(ctx);
		if (summary.progress) logProgressSummary(summary.progress);
		if (preview) {
			await writePreview(config.preview.output, preview);
			logSuccess(`Formatting preview has been generated in ${config.preview.output}`);
		}
		logSummary(summary);

		process.exitCode = summary.exitCode;
	},
});

runMain(main);
