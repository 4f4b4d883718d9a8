import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { toCss } from "./colors.js";
import type { StyledRun, TextRun } from "./styles.js";

const PREVIEW_STYLES = `
html {
  background-color: #202327;
}
span, h1, h2, h3 {
  color: #ffffff;
}
span {
  font-family: sans-serif;
  font-weight: lighter;
  font-size: 1.725vh;
}
.condensed {
  font-stretch: condensed;
  font-size: 2.07vh;
}
.bolded {
  font-weight: bold;
}
`;

const HTML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&#39;",
};

export function escapeHtml(value: string): string {
	return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function runToHtml(run: TextRun): string {
	const classes: string[] = [];
	if (run.condensed) classes.push("condensed");
	if (run.bold) classes.push("bolded");

	let style = "";
	if (run.italic) style += "font-style: italic;";
	style += `color: ${toCss(run.color)};`;

	const classAttr = classes.length > 0 ? ` class="${classes.join(" ")}"` : "";
	return `<span${classAttr} style="${style}">${escapeHtml(run.text)}</span>`;
}

export function runsToHtml(runs: StyledRun[]): string {
	const body = runs
		.map((run) => (run.type === "break" ? "<br>" : runToHtml(run)))
		.join("");
	return `<span>${body}</span>`;
}

export interface PreviewDocument {
	heading(level: 1 | 2 | 3, text: string): void;
	addString(runs: StyledRun[]): void;
	render(): string;
}

export function createPreviewDocument(
	title = "Text formatting preview",
): PreviewDocument {
	const parts: string[] = [];

	return {
		heading(level, text) {
			parts.push(`<h${level}>${escapeHtml(text)}</h${level}>`);
		},
		addString(runs) {
			parts.push(runsToHtml(runs));
		},
		render() {
			return [
				"<!DOCTYPE html>",
				"<html>",
				"<head>",
				`<title>${escapeHtml(title)}</title>`,
				`<style>${PREVIEW_STYLES}</style>`,
				"</head>",
				`<body>${parts.join("")}</body>`,
				"</html>",
				"",
			].join("\n");
		},
	};
}

export async function writePreview(
	filePath: string,
	document: PreviewDocument,
): Promise<void> {
	await mkdir(dirname(filePath), { recursive: true });
	await writeFile(filePath, document.render(), "utf-8");
}
