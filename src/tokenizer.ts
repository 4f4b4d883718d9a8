import {
	DIRECTIVE_PATTERN,
	SHORT_FORMAT_PATTERN,
	VARIABLE_PATTERN,
	classifyDirective,
	type Directive,
} from "./grammar.js";

export type Token =
	| { type: "text"; text: string; offset: number }
	| { type: "directive"; directive: Directive };

export interface Match {
	literal: string;
	offset: number;
}

const DIRECTIVE_REGEX = new RegExp(DIRECTIVE_PATTERN, "g");
const SHORT_FORMAT_REGEX = new RegExp(SHORT_FORMAT_PATTERN, "g");
const VARIABLE_REGEX = new RegExp(VARIABLE_PATTERN, "g");

/**
 * Split `text` into plain-text fragments and directives.
 *
 * A text token precedes every directive and follows the last one, even when
 * empty, so joining the tokens' text and literals gives back `text` exactly.
 */
export function tokenize(text: string): Token[] {
	const tokens: Token[] = [];
	let cursor = 0;

	for (const match of text.matchAll(DIRECTIVE_REGEX)) {
		const offset = match.index ?? 0;
		tokens.push({ type: "text", text: text.slice(cursor, offset), offset: cursor });
		tokens.push({
			type: "directive",
			directive: classifyDirective(match[0], offset),
		});
		cursor = offset + match[0].length;
	}

	tokens.push({ type: "text", text: text.slice(cursor), offset: cursor });
	return tokens;
}

export function tokenLiteral(token: Token): string {
	return token.type === "text" ? token.text : token.directive.literal;
}

export function joinTokens(tokens: Token[]): string {
	return tokens.map(tokenLiteral).join("");
}

export function directivesOf(tokens: Token[]): Directive[] {
	const directives: Directive[] = [];
	for (const token of tokens) {
		if (token.type === "directive") directives.push(token.directive);
	}
	return directives;
}

function findAll(text: string, regex: RegExp): Match[] {
	return Array.from(text.matchAll(regex), (match) => ({
		literal: match[0],
		offset: match.index ?? 0,
	}));
}

/** Short-format directives of `text`, left to right. */
export function findShortFormats(text: string): Match[] {
	return findAll(text, SHORT_FORMAT_REGEX);
}

/** `{N}` placeholder variables of `text`, left to right, duplicates kept. */
export function findVariables(text: string): Match[] {
	return findAll(text, VARIABLE_REGEX);
}
