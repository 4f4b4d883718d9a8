import { describe, expect, it } from "vitest";
import {
	findShortFormats,
	findVariables,
	joinTokens,
	tokenize,
} from "../src/tokenizer.js";

describe("tokenize", () => {
	it("splits text and directives with offsets", () => {
		const tokens = tokenize("Hello ~r~world~s~");
		expect(tokens.map((t) => (t.type === "text" ? t.text : t.directive.literal))).toEqual([
			"Hello ",
			"~r~",
			"world",
			"~s~",
			"",
		]);
		expect(tokens.map((t) => (t.type === "text" ? t.offset : t.directive.offset))).toEqual([
			0, 6, 9, 14, 17,
		]);
	});

	it("emits empty fragments between adjacent directives", () => {
		const tokens = tokenize("~h~~h~");
		expect(tokens).toHaveLength(5);
		expect(tokens[0]).toEqual({ type: "text", text: "", offset: 0 });
		expect(tokens[2]).toEqual({ type: "text", text: "", offset: 3 });
	});

	it("leaves an unterminated delimiter as text", () => {
		expect(tokenize("Score: 10~")).toEqual([
			{ type: "text", text: "Score: 10~", offset: 0 },
		]);
	});

	it("does not treat spaced words as directives", () => {
		expect(tokenize("a ~b c~ d")).toHaveLength(1);
	});

	it("round-trips every input", () => {
		for (const text of [
			"",
			"Hello ~r~world~s~",
			"Score: 10~",
			"~~h~~",
			"(C)x(/C)~n~~CC_1_2_3~y~HUD_COLOUR_BLUE~",
			"{0} ~a~ {1}",
		]) {
			expect(joinTokens(tokenize(text))).toBe(text);
		}
	});

	it("is deterministic", () => {
		const text = "~h~Bold~h~ (C)tiny(/C)";
		expect(tokenize(text)).toEqual(tokenize(text));
	});
});

describe("findShortFormats", () => {
	it("finds letters and the player color in order", () => {
		expect(findShortFormats("~r~a~HUD_COLOUR_NET_PLAYER1~b~s~")).toEqual([
			{ literal: "~r~", offset: 0 },
			{ literal: "~HUD_COLOUR_NET_PLAYER1~", offset: 4 },
			{ literal: "~s~", offset: 29 },
		]);
	});

	it("ignores long-form directives", () => {
		expect(findShortFormats("~bold~x~HUD_COLOUR_RED~")).toEqual([]);
	});
});

describe("findVariables", () => {
	it("keeps duplicates and order", () => {
		expect(findVariables("Hi {0}, {1} and {0}").map((m) => m.literal)).toEqual([
			"{0}",
			"{1}",
			"{0}",
		]);
	});

	it("ignores named placeholders", () => {
		expect(findVariables("Hello {name}")).toEqual([]);
	});
});
