import { readFile } from "node:fs/promises";
import { checkTranslation } from "./checks.js";
import {
	ENTRY_TAG,
	ID_ATTRIBUTE,
	checkKnownTag,
	entryLabel,
	quote,
	readEntry,
} from "./entries.js";
import type { PreviewDocument } from "./preview.js";
import {
	at,
	createReporter,
	type DiagnosticCounts,
	type DiagnosticReporter,
} from "./reporter.js";
import { EMPTY_SIGNATURE, extractSignature } from "./signature.js";
import { renderRuns } from "./styles.js";
import { tokenize } from "./tokenizer.js";
import type { Diagnostic, Entry } from "./types.js";
import { XmlParseError, parseXml, type XmlElement } from "./xml/parser.js";

export interface ValidationOptions {
	referenceLanguage: string;
	showLang?: string;
	warningsAsErrors: boolean;
	displayLimit: number;
	preview?: PreviewDocument;
	onDiagnostic?: (diagnostic: Diagnostic) => void;
}

/**
 * Everything a run accumulates. Files are checked one after another against
 * the same context, so identifiers are unique across the whole run.
 */
export interface ValidationContext {
	options: ValidationOptions;
	reporter: DiagnosticReporter;
	usedIds: Set<string>;
	totalStrings: number;
	missingTranslations: Map<string, number>;
	/** Missing-language diagnostics printed so far, capped by `displayLimit`. */
	shownMissing: number;
}

export function createValidationContext(
	options: Partial<ValidationOptions> = {},
): ValidationContext {
	const resolved: ValidationOptions = {
		referenceLanguage: "en-US",
		warningsAsErrors: false,
		displayLimit: 10,
		...options,
	};
	return {
		options: resolved,
		reporter: createReporter({
			warningsAsErrors: resolved.warningsAsErrors,
			onDiagnostic: resolved.onDiagnostic,
		}),
		usedIds: new Set(),
		totalStrings: 0,
		missingTranslations: new Map(),
		shownMissing: 0,
	};
}

function checkedLanguages(options: ValidationOptions): string[] {
	const languages = [options.referenceLanguage];
	if (options.showLang && options.showLang !== options.referenceLanguage) {
		languages.push(options.showLang);
	}
	return languages;
}

function checkMissingLanguages(
	entry: Entry,
	path: string[],
	ctx: ValidationContext,
): void {
	const found = new Set(entry.translations.map((t) => t.language));
	const missing = checkedLanguages(ctx.options).filter((l) => !found.has(l));
	if (missing.length === 0) return;

	for (const language of missing) {
		ctx.missingTranslations.set(
			language,
			(ctx.missingTranslations.get(language) ?? 0) + 1,
		);
	}

	if (ctx.shownMissing < ctx.options.displayLimit) {
		const noun = missing.length === 1 ? "translation" : "translations";
		ctx.reporter.warn(
			`Missing ${noun} for ${missing.map(quote).join(", ")}!`,
			at(path, entry.position),
		);
	}
	ctx.shownMissing++;
}

export function checkEntry(
	element: XmlElement,
	parentPath: string[],
	ctx: ValidationContext,
): void {
	const { reporter, options } = ctx;
	const id = element.attributes[ID_ATTRIBUTE];
	let path = parentPath;

	if (id === undefined) {
		reporter.error("Found element without id!", at(path, element.position));
	} else {
		if (ctx.usedIds.has(id)) {
			reporter.error(
				`Found element duplicate with id ${quote(id)}!`,
				at(path, element.position),
			);
			ctx.totalStrings--;
		}
		ctx.usedIds.add(id);
		path = [...path, entryLabel(id)];
		options.preview?.heading(2, id);
	}

	const entry = readEntry(element, path, reporter, options.displayLimit);
	const reference = entry.translations.find(
		(t) => t.language === options.referenceLanguage,
	);
	const signature = reference ? extractSignature(reference.text) : EMPTY_SIGNATURE;

	for (const translation of entry.translations) {
		if (options.preview) {
			options.preview.heading(3, translation.language);
			options.preview.addString(renderRuns(tokenize(translation.text)));
		}
		checkTranslation(
			translation,
			signature,
			[...path, translation.language],
			reporter,
		);
	}

	checkMissingLanguages(entry, path, ctx);
}

export function checkDocument(
	root: XmlElement,
	file: string,
	ctx: ValidationContext,
): void {
	const path = [file, root.name];
	for (const child of root.children) {
		if (
			checkKnownTag(child, [ENTRY_TAG], path, ctx.reporter, ctx.options.displayLimit)
		) {
			checkEntry(child, path, ctx);
			ctx.totalStrings++;
		}
	}
}

/** Parse and check one document; a parse failure is fatal for this file only. */
export function checkSource(
	xmlText: string,
	file: string,
	ctx: ValidationContext,
): void {
	ctx.options.preview?.heading(1, file);
	let root: XmlElement;
	try {
		root = parseXml(xmlText, file);
	} catch (err) {
		if (err instanceof XmlParseError) {
			ctx.reporter.fatal(`Invalid file: ${err.message}`, at([file], err.position));
			return;
		}
		throw err;
	}
	checkDocument(root, file, ctx);
}

export async function checkFile(
	file: string,
	ctx: ValidationContext,
): Promise<void> {
	let xmlText: string;
	try {
		xmlText = await readFile(file, "utf-8");
	} catch (err) {
		ctx.reporter.error(
			`Invalid file: ${err instanceof Error ? err.message : String(err)}`,
			at([file]),
		);
		return;
	}
	checkSource(xmlText, file, ctx);
}

export async function checkFiles(
	files: string[],
	ctx: ValidationContext,
): Promise<void> {
	for (const file of files) {
		await checkFile(file, ctx);
	}
}

export interface ValidationSummary {
	counts: DiagnosticCounts;
	totalStrings: number;
	/** Set when a language is selected with `showLang`. */
	progress?: LanguageProgress;
	exitCode: number;
}

export interface LanguageProgress {
	language: string;
	missing: number;
	translated: number;
	total: number;
	percent: number;
}

export function languageProgress(
	language: string,
	missing: number,
	total: number,
): LanguageProgress {
	const translated = total - missing;
	const percent = total > 0 ? Math.floor((translated / total) * 100) : 100;
	return { language, missing, translated, total, percent };
}

export function summarize(ctx: ValidationContext): ValidationSummary {
	const { showLang } = ctx.options;
	return {
		counts: ctx.reporter.counts(),
		totalStrings: ctx.totalStrings,
		progress: showLang
			? languageProgress(
					showLang,
					ctx.missingTranslations.get(showLang) ?? 0,
					ctx.totalStrings,
				)
			: undefined,
		exitCode: ctx.reporter.exitCode(),
	};
}
