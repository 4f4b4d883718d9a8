import { isKnownColor } from "./colors.js";
import {
	DIRECTIVE_DELIMITER,
	DUPLICATE_EXEMPT_FORMATS,
	PUNCTUATION_PATTERN,
	SHORT_FORMAT_PATTERN,
} from "./grammar.js";
import { at, type DiagnosticReporter } from "./reporter.js";
import {
	type FormattingSignature,
	hasFormattingRequirement,
} from "./signature.js";
import {
	type Match,
	directivesOf,
	findShortFormats,
	findVariables,
	tokenize,
} from "./tokenizer.js";
import type { SourcePosition, Translation } from "./types.js";

export interface TextIssue {
	severity: "error" | "warning";
	message: string;
	/** Offset into the translation text; 0 means the start of the string. */
	offset: number;
}

const TOO_MANY_SPACES_REGEX = /\s~[sbrnypgohc]~\s|\s\s+/;
const WRONG_PUNCTUATION_REGEX = new RegExp(
	`\\s${PUNCTUATION_PATTERN}|\\s${SHORT_FORMAT_PATTERN}${PUNCTUATION_PATTERN}`,
);

function unique(values: string[]): string[] {
	return [...new Set(values)];
}

export function checkFormatting(
	found: Match[],
	signature: FormattingSignature,
): TextIssue[] {
	if (!hasFormattingRequirement(signature)) return [];

	const issues: TextIssue[] = [];
	const required = new Set(signature.required);
	const present = new Set(found.map((m) => m.literal));

	const invalid = found.filter((m) => !required.has(m.literal));
	if (invalid.length > 0) {
		issues.push({
			severity: "error",
			message: `Found invalid text formatting: ${unique(invalid.map((m) => m.literal)).join(", ")}`,
			offset: invalid[0].offset,
		});
	}

	const missing = signature.required.filter((literal) => !present.has(literal));
	if (missing.length > 0) {
		issues.push({
			severity: "error",
			message: `Missing text formatting: ${missing.join(", ")}`,
			offset: 0,
		});
	}

	for (let i = 0; i < found.length - 1; i++) {
		const literal = found[i].literal;
		if (DUPLICATE_EXEMPT_FORMATS.has(literal)) continue;
		if (literal === found[i + 1].literal) {
			issues.push({
				severity: "error",
				message: `Found text formatting duplicate: ${literal}`,
				offset: found[i + 1].offset,
			});
			break;
		}
	}

	const last = found.at(-1);
	if (last && last.literal !== signature.terminal) {
		issues.push({
			severity: "error",
			message: `String ends with a wrong format '${last.literal}', expected '${signature.terminal}'`,
			offset: last.offset,
		});
	}

	return issues;
}

export function checkColors(text: string): TextIssue[] {
	const issues: TextIssue[] = [];
	for (const directive of directivesOf(tokenize(text))) {
		if (directive.kind === "color-named" && !isKnownColor(directive.name)) {
			issues.push({
				severity: "error",
				message: `Unknown color '${directive.name}'`,
				offset: directive.offset,
			});
		}
	}
	return issues;
}

export function checkVariables(
	found: Match[],
	required: string[],
): TextIssue[] {
	const literals = found.map((m) => m.literal);

	if (found.length < required.length) {
		const missing = unique(required.filter((v) => !literals.includes(v)));
		if (missing.length === 0) return [];
		return [
			{
				severity: "error",
				message: `Missing variables: ${missing.join(", ")}`,
				offset: 0,
			},
		];
	}

	if (found.length > required.length) {
		const extra = found.filter((m) => !required.includes(m.literal));
		const lastExtra = extra.at(-1);
		if (!lastExtra) return [];
		return [
			{
				severity: "error",
				message: `Found too many variables: ${unique(extra.map((m) => m.literal)).join(", ")}`,
				offset: lastExtra.offset,
			},
		];
	}

	return [];
}

/**
 * First delimiter that is not part of a recognized short-format directive.
 * `found` must be in text order.
 */
export function findStrayDelimiter(
	text: string,
	found: Match[],
): number | undefined {
	let span = 0;
	for (
		let i = text.indexOf(DIRECTIVE_DELIMITER);
		i !== -1;
		i = text.indexOf(DIRECTIVE_DELIMITER, i + 1)
	) {
		while (
			span < found.length &&
			found[span].offset + found[span].literal.length <= i
		) {
			span++;
		}
		if (span < found.length && found[span].offset <= i) continue;
		return i;
	}
	return undefined;
}

export function checkStyle(text: string): TextIssue[] {
	const issues: TextIssue[] = [];

	const spaces = TOO_MANY_SPACES_REGEX.exec(text);
	if (spaces) {
		issues.push({
			severity: "warning",
			message: "Found too many spaces between words",
			offset: spaces.index + spaces[0].length - 1,
		});
	}

	const punctuation = WRONG_PUNCTUATION_REGEX.exec(text);
	if (punctuation) {
		issues.push({
			severity: "warning",
			message: "Found invalid punctuation mark placement",
			offset: punctuation.index,
		});
	}

	return issues;
}

/** Every issue of one translation against its entry's signature, in report order. */
export function findTranslationIssues(
	text: string,
	signature: FormattingSignature,
): TextIssue[] {
	const formats = findShortFormats(text);
	const issues = [
		...checkFormatting(formats, signature),
		...checkColors(text),
		...checkVariables(findVariables(text), signature.variables),
	];

	if (text.length === 0) {
		issues.push({ severity: "error", message: "Found empty translation", offset: 0 });
	}

	const stray = findStrayDelimiter(text, formats);
	if (stray !== undefined) {
		issues.push({
			severity: "error",
			message: `Found invalid text formatting (${DIRECTIVE_DELIMITER})`,
			offset: stray,
		});
	}

	issues.push(...checkStyle(text));
	return issues;
}

/** Source position of `offset` in a text that starts at `start`. */
export function positionAt(
	start: SourcePosition,
	text: string,
	offset: number,
): SourcePosition {
	const before = text.slice(0, offset);
	const lastBreak = before.lastIndexOf("\n");
	if (lastBreak === -1) {
		return { line: start.line, column: start.column + offset };
	}
	const lines = before.split("\n").length - 1;
	return { line: start.line + lines, column: offset - lastBreak };
}

export function checkTranslation(
	translation: Translation,
	signature: FormattingSignature,
	path: string[],
	reporter: DiagnosticReporter,
): void {
	for (const issue of findTranslationIssues(translation.text, signature)) {
		const location = at(
			path,
			positionAt(translation.textPosition, translation.text, issue.offset),
		);
		if (issue.severity === "warning") {
			reporter.warn(issue.message, location);
		} else {
			reporter.error(issue.message, location);
		}
	}
}
