import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
	createPreviewDocument,
	escapeHtml,
	runsToHtml,
	writePreview,
} from "../src/preview.js";
import { renderRuns } from "../src/styles.js";
import { tokenize } from "../src/tokenizer.js";

const GREY = "color: rgba(205,205,205,1);";

function html(text: string): string {
	return runsToHtml(renderRuns(tokenize(text)));
}

describe("runsToHtml", () => {
	it("renders bold runs and escapes text", () => {
		expect(html("~h~Bold~h~ <x>")).toBe(
			`<span><span class="bolded" style="${GREY}">Bold</span><span style="${GREY}"> &lt;x&gt;</span></span>`,
		);
	});

	it("renders breaks", () => {
		expect(html("a~n~b")).toBe(
			`<span><span style="${GREY}">a</span><br><span style="${GREY}">b</span></span>`,
		);
	});

	it("combines condensed and italic styles", () => {
		expect(html("(C)~italic~x")).toBe(
			`<span><span class="condensed" style="font-style: italic;${GREY}">x</span></span>`,
		);
	});

	it("renders custom colors", () => {
		expect(html("~CC_10_20_30~x")).toBe(
			'<span><span style="color: rgba(10,20,30,1);">x</span></span>',
		);
	});
});

describe("escapeHtml", () => {
	it("escapes markup characters", () => {
		expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
			"&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;",
		);
	});
});

describe("createPreviewDocument", () => {
	it("renders headings and strings into a full document", () => {
		const doc = createPreviewDocument();
		doc.heading(1, "a&b.xml");
		doc.addString(renderRuns(tokenize("Hi")));

		const rendered = doc.render();
		expect(rendered.startsWith("<!DOCTYPE html>\n<html>\n<head>\n<title>Text formatting preview</title>")).toBe(true);
		expect(rendered).toContain(
			`<body><h1>a&amp;b.xml</h1><span><span style="${GREY}">Hi</span></span></body>`,
		);
	});
});

describe("writePreview", () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), "fmtguard-preview-"));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it("writes the rendered document, creating directories", async () => {
		const doc = createPreviewDocument("Preview");
		doc.heading(2, "ID");
		const filePath = join(tempDir, "out", "preview.html");
		await writePreview(filePath, doc);

		expect(await readFile(filePath, "utf-8")).toBe(doc.render());
	});
});
