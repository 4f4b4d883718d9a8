import type { Rgba } from "./colors.js";

/**
 * Short-format directives are the single-letter `~x~` markers (plus one named
 * player color) that every translation of an entry must use consistently.
 */
export const SHORT_FORMAT_PATTERN = "~(?:[sbrnypgohc]|HUD_COLOUR_NET_PLAYER1)~";

export const VARIABLE_PATTERN = "\\{[0-9]+\\}";

export const PUNCTUATION_PATTERN = "[.,?!]";

export const DIRECTIVE_DELIMITER = "~";

/** Consecutive repeats of these are legitimate (toggle on/off, blank lines, resets). */
export const DUPLICATE_EXEMPT_FORMATS: ReadonlySet<string> = new Set([
	"~h~",
	"~n~",
	"~s~",
]);

export interface RewriteRule {
	from: string;
	to: string;
}

/** Shorthand color directives and the canonical long form each stands for. */
export const REWRITE_RULES: readonly RewriteRule[] = [
	{ from: "~r~", to: "~HUD_COLOUR_RED~" },
	{ from: "~b~", to: "~HUD_COLOUR_BLUE~" },
	{ from: "~g~", to: "~HUD_COLOUR_GREEN~" },
	{ from: "~y~", to: "~HUD_COLOUR_YELLOW~" },
	{ from: "~p~", to: "~HUD_COLOUR_PURPLE~" },
	{ from: "~o~", to: "~HUD_COLOUR_ORANGE~" },
	{ from: "~c~", to: "~HUD_COLOUR_GREY~" },
	{ from: "~s~", to: "~HUD_COLOUR_WHITE~" },
];

/**
 * Applying the rules in sequence only gives the same result as applying them in
 * any order if no rule produces text that some rule consumes.
 */
export function assertRewriteTable(rules: readonly RewriteRule[]): void {
	const sources = new Set<string>();
	for (const rule of rules) {
		if (sources.has(rule.from)) {
			throw new Error(`Rewrite rule for ${rule.from} is declared twice`);
		}
		sources.add(rule.from);
	}
	for (const rule of rules) {
		for (const other of rules) {
			if (rule.to.includes(other.from)) {
				throw new Error(
					`Rewrite output ${rule.to} contains rewrite input ${other.from}`,
				);
			}
		}
	}
}

assertRewriteTable(REWRITE_RULES);

const REWRITES = new Map(REWRITE_RULES.map((rule) => [rule.from, rule.to]));

const SHORTHAND_REGEX = new RegExp(
	REWRITE_RULES.map((rule) => escapeRegex(rule.from)).join("|"),
	"g",
);

function escapeRegex(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Canonical form of a single directive literal. */
export function rewriteShorthand(literal: string): string {
	return REWRITES.get(literal) ?? literal;
}

/** Replace every shorthand directive in `text` with its canonical form, left to right. */
export function rewriteText(text: string): string {
	return text.replace(SHORTHAND_REGEX, (match) => rewriteShorthand(match));
}

/**
 * Every literal form a directive can take. The catch-all `~WORD~` alternative
 * comes last so the specific forms win.
 */
export const DIRECTIVE_PATTERN = [
	"~(?:h|bold|italic|n)~",
	"\\(C\\)",
	"\\(/C\\)",
	"~(?:HUD_COLOUR|HC)_[A-Za-z0-9_]+~",
	"~CC_[0-9]{1,3}_[0-9]{1,3}_[0-9]{1,3}~",
	"~[A-Za-z0-9_]+~",
].join("|");

interface DirectiveBase {
	literal: string;
	canonical: string;
	offset: number;
}

export type Directive =
	| (DirectiveBase & { kind: "bold" })
	| (DirectiveBase & { kind: "italic" })
	| (DirectiveBase & { kind: "newline" })
	| (DirectiveBase & { kind: "condensed-open" })
	| (DirectiveBase & { kind: "condensed-close" })
	| (DirectiveBase & { kind: "color-named"; name: string })
	| (DirectiveBase & { kind: "color-custom"; color: Rgba })
	| (DirectiveBase & { kind: "other" });

export type DirectiveKind = Directive["kind"];

const NAMED_COLOR_REGEX = /^~((?:HUD_COLOUR|HC)_[A-Za-z0-9_]+)~$/;
const CUSTOM_COLOR_REGEX = /^~CC_([0-9]{1,3})_([0-9]{1,3})_([0-9]{1,3})~$/;

export function classifyDirective(literal: string, offset: number): Directive {
	const canonical = rewriteShorthand(literal);
	const base = { literal, canonical, offset };

	switch (canonical) {
		case "~h~":
		case "~bold~":
			return { ...base, kind: "bold" };
		case "~italic~":
			return { ...base, kind: "italic" };
		case "~n~":
			return { ...base, kind: "newline" };
		case "(C)":
			return { ...base, kind: "condensed-open" };
		case "(/C)":
			return { ...base, kind: "condensed-close" };
	}

	const named = NAMED_COLOR_REGEX.exec(canonical);
	if (named) {
		return { ...base, kind: "color-named", name: named[1] };
	}

	const custom = CUSTOM_COLOR_REGEX.exec(canonical);
	if (custom) {
		const [r, g, b] = [custom[1], custom[2], custom[3]].map(Number);
		if (r <= 255 && g <= 255 && b <= 255) {
			return { ...base, kind: "color-custom", color: { r, g, b, a: 255 } };
		}
	}

	return { ...base, kind: "other" };
}
