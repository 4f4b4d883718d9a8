import { describe, expect, it } from "vitest";
import {
	checkTranslation,
	findStrayDelimiter,
	findTranslationIssues,
	positionAt,
} from "../src/checks.js";
import { createReporter } from "../src/reporter.js";
import { EMPTY_SIGNATURE, extractSignature } from "../src/signature.js";
import { findShortFormats } from "../src/tokenizer.js";
import type { Translation } from "../src/types.js";

const greeting = extractSignature("Hello ~r~world~s~");

describe("formatting checks", () => {
	it("accepts a consistent translation", () => {
		expect(findTranslationIssues("Hallo ~r~Welt~s~", greeting)).toEqual([]);
	});

	it("reports a wrong terminal directive at its offset", () => {
		expect(findTranslationIssues("Hallo ~s~Welt~r~", greeting)).toEqual([
			{
				severity: "error",
				message: "String ends with a wrong format '~r~', expected '~s~'",
				offset: 13,
			},
		]);
	});

	it("reports invalid and missing formats", () => {
		expect(findTranslationIssues("Hallo ~g~Welt~s~", greeting)).toEqual([
			{ severity: "error", message: "Found invalid text formatting: ~g~", offset: 6 },
			{ severity: "error", message: "Missing text formatting: ~r~", offset: 0 },
		]);
	});

	it("reports every missing format when a translation has none", () => {
		expect(findTranslationIssues("Hallo Welt", greeting)).toEqual([
			{ severity: "error", message: "Missing text formatting: ~r~, ~s~", offset: 0 },
		]);
	});

	it("reports back-to-back duplicates", () => {
		const signature = extractSignature("~r~a~s~");
		expect(findTranslationIssues("~r~~r~a~s~", signature)).toEqual([
			{ severity: "error", message: "Found text formatting duplicate: ~r~", offset: 3 },
		]);
	});

	it("allows repeated toggles", () => {
		const signature = extractSignature("~h~bold~h~");
		expect(findTranslationIssues("~h~~h~", signature)).toEqual([]);
	});

	it("skips formatting checks when the reference has no formats", () => {
		const signature = extractSignature("Plain text");
		expect(findTranslationIssues("~r~Hi~g~", signature)).toEqual([]);
	});
});

describe("variable checks", () => {
	const signature = extractSignature("Hi {0}, you have {1} items");

	it("reports missing variables", () => {
		expect(findTranslationIssues("Hallo {0}", signature)).toEqual([
			{ severity: "error", message: "Missing variables: {1}", offset: 0 },
		]);
	});

	it("reports unneeded variables at the last extra occurrence", () => {
		expect(findTranslationIssues("{0}{1}{2}", signature)).toEqual([
			{ severity: "error", message: "Found too many variables: {2}", offset: 6 },
		]);
	});

	it("compares counts, not names, when the counts match", () => {
		expect(findTranslationIssues("{0}{0}", signature)).toEqual([]);
	});
});

describe("text checks", () => {
	it("reports empty translations", () => {
		expect(findTranslationIssues("", EMPTY_SIGNATURE)).toEqual([
			{ severity: "error", message: "Found empty translation", offset: 0 },
		]);
	});

	it("reports a stray delimiter at its offset", () => {
		expect(findTranslationIssues("Score: 10~", EMPTY_SIGNATURE)).toEqual([
			{ severity: "error", message: "Found invalid text formatting (~)", offset: 9 },
		]);
	});

	it("finds a stray delimiter after valid directives", () => {
		expect(findTranslationIssues("~r~Hi~ there~s~", EMPTY_SIGNATURE)).toEqual([
			{ severity: "error", message: "Found invalid text formatting (~)", offset: 5 },
		]);
	});

	it("reports unknown named colors", () => {
		expect(findTranslationIssues("~HUD_COLOUR_NOPE~x", EMPTY_SIGNATURE)).toEqual([
			{ severity: "error", message: "Unknown color 'HUD_COLOUR_NOPE'", offset: 0 },
			{ severity: "error", message: "Found invalid text formatting (~)", offset: 0 },
		]);
	});

	it("warns about double spaces", () => {
		expect(findTranslationIssues("Hello  world", EMPTY_SIGNATURE)).toEqual([
			{ severity: "warning", message: "Found too many spaces between words", offset: 6 },
		]);
	});

	it("warns about a spaced-out directive", () => {
		expect(findTranslationIssues("Hello ~r~ world", EMPTY_SIGNATURE)).toEqual([
			{ severity: "warning", message: "Found too many spaces between words", offset: 9 },
		]);
	});

	it("warns about a space before punctuation", () => {
		expect(findTranslationIssues("Hello !", EMPTY_SIGNATURE)).toEqual([
			{ severity: "warning", message: "Found invalid punctuation mark placement", offset: 5 },
		]);
		expect(findTranslationIssues("Hello ~s~!", EMPTY_SIGNATURE)).toEqual([
			{ severity: "warning", message: "Found invalid punctuation mark placement", offset: 5 },
		]);
	});
});

describe("findStrayDelimiter", () => {
	it("returns undefined when every delimiter belongs to a directive", () => {
		const text = "~r~a~s~";
		expect(findStrayDelimiter(text, findShortFormats(text))).toBeUndefined();
	});

	it("skips over directives before the stray one", () => {
		const text = "~r~~s~~";
		expect(findStrayDelimiter(text, findShortFormats(text))).toBe(6);
	});
});

describe("positionAt", () => {
	it("adds the offset to the column on the first line", () => {
		expect(positionAt({ line: 3, column: 20 }, "ab\ncd", 1)).toEqual({ line: 3, column: 21 });
	});

	it("follows line breaks", () => {
		expect(positionAt({ line: 3, column: 20 }, "ab\ncd", 4)).toEqual({ line: 4, column: 2 });
	});
});

describe("checkTranslation", () => {
	const translation: Translation = {
		language: "de-DE",
		text: "Score: 10~",
		textPosition: { line: 2, column: 21 },
	};
	const path = ["f.xml", "Entries", "Entry('A')", "de-DE"];

	it("reports issues at source positions", () => {
		const reporter = createReporter();
		checkTranslation(translation, EMPTY_SIGNATURE, path, reporter);
		expect(reporter.diagnostics()).toEqual([
			{
				severity: "error",
				message: "Found invalid text formatting (~)",
				location: { path, position: { line: 2, column: 30 } },
			},
		]);
	});

	it("promotes style warnings when configured", () => {
		const reporter = createReporter({ warningsAsErrors: true });
		checkTranslation({ ...translation, text: "Hello  world" }, EMPTY_SIGNATURE, path, reporter);
		expect(reporter.diagnostics().map((d) => d.severity)).toEqual(["error"]);
	});
});
