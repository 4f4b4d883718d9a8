import { DEFAULT_COLOR, resolveColor, type Rgba } from "./colors.js";
import type { Directive } from "./grammar.js";
import type { Token } from "./tokenizer.js";

export interface StyleState {
	bold: boolean;
	italic: boolean;
	condensedDepth: number;
	color: Rgba;
	newline: boolean;
}

export interface TextRun {
	type: "text";
	text: string;
	bold: boolean;
	italic: boolean;
	condensed: boolean;
	color: Rgba;
}

export type StyledRun = TextRun | { type: "break" };

export function initialStyle(): StyleState {
	return {
		bold: false,
		italic: false,
		condensedDepth: 0,
		color: { ...DEFAULT_COLOR },
		newline: false,
	};
}

export function applyDirective(
	state: StyleState,
	directive: Directive,
): StyleState {
	switch (directive.kind) {
		case "bold":
			return { ...state, bold: !state.bold };
		case "italic":
			return { ...state, italic: !state.italic };
		case "newline":
			return { ...state, newline: !state.newline };
		case "condensed-open":
			return { ...state, condensedDepth: state.condensedDepth + 1 };
		case "condensed-close":
			return { ...state, condensedDepth: Math.max(0, state.condensedDepth - 1) };
		case "color-named":
			// Unknown names are reported by the checks, the preview just keeps going.
			return { ...state, color: resolveColor(directive.name) ?? { ...DEFAULT_COLOR } };
		case "color-custom":
			return { ...state, color: { ...directive.color } };
		case "other":
			return state;
		default: {
			const unhandled: never = directive;
			return unhandled;
		}
	}
}

function textRun(text: string, state: StyleState): TextRun {
	return {
		type: "text",
		text,
		bold: state.bold,
		italic: state.italic,
		condensed: state.condensedDepth > 0,
		color: { ...state.color },
	};
}

/**
 * Interpret a token stream into styled runs. A directive affects the text after
 * it; every newline directive flips the newline flag and puts a break where it
 * stands. Empty fragments produce no run.
 */
export function renderRuns(tokens: Token[]): StyledRun[] {
	const runs: StyledRun[] = [];
	let state = initialStyle();

	for (const token of tokens) {
		if (token.type === "text") {
			if (token.text !== "") runs.push(textRun(token.text, state));
			continue;
		}
		const next = applyDirective(state, token.directive);
		if (next.newline !== state.newline) runs.push({ type: "break" });
		state = next;
	}

	return runs;
}
