import { at, type DiagnosticReporter } from "./reporter.js";
import type { Entry, Translation } from "./types.js";
import type { XmlElement } from "./xml/parser.js";

export const ENTRY_TAG = "Entry";
export const STRING_TAG = "String";
export const ID_ATTRIBUTE = "Id";
export const LANG_ATTRIBUTE = "xml:lang";

export function quote(value: string): string {
	return `'${value}'`;
}

/** Breadcrumb for an entry, e.g. `Entry('MENU_TITLE')`. */
export function entryLabel(id: string): string {
	return `${ENTRY_TAG}(${quote(id)})`;
}

export function checkKnownTag(
	element: XmlElement,
	knownTags: string[],
	path: string[],
	reporter: DiagnosticReporter,
	displayLimit: number,
): boolean {
	if (knownTags.includes(element.name)) return true;
	const expected = knownTags.slice(0, displayLimit).join(", ");
	reporter.error(
		`Unknown tag: ${quote(element.name)}, expected one of these: ${expected}`,
		at(path, element.position),
	);
	return false;
}

function readTranslation(
	element: XmlElement,
	path: string[],
	reporter: DiagnosticReporter,
): Translation | undefined {
	for (const name of Object.keys(element.attributes)) {
		if (name !== LANG_ATTRIBUTE) {
			reporter.error(`Unknown attribute: ${quote(name)}`, at(path, element.position));
		}
	}

	const language = element.attributes[LANG_ATTRIBUTE];
	if (language === undefined) {
		reporter.error(
			`Found string without ${quote(LANG_ATTRIBUTE)} attribute`,
			at(path, element.position),
		);
		return undefined;
	}

	return {
		language,
		text: element.text,
		textPosition: element.textPosition,
	};
}

/**
 * Build an Entry from its element, reporting unknown children, unknown
 * attributes and languages that appear twice. Identifier checks are left to
 * the caller, which sees every file.
 */
export function readEntry(
	element: XmlElement,
	path: string[],
	reporter: DiagnosticReporter,
	displayLimit: number,
): Entry {
	const translations: Translation[] = [];
	const seen = new Set<string>();

	for (const child of element.children) {
		if (!checkKnownTag(child, [STRING_TAG], path, reporter, displayLimit)) {
			continue;
		}
		const translation = readTranslation(child, path, reporter);
		if (!translation) continue;

		if (seen.has(translation.language)) {
			reporter.error(
				`Found duplicate string for ${translation.language}`,
				at(path, child.position),
			);
		}
		seen.add(translation.language);
		translations.push(translation);
	}

	return {
		id: element.attributes[ID_ATTRIBUTE],
		position: element.position,
		translations,
	};
}
