import { readFileSync } from "node:fs";
import { z } from "zod";

export interface Rgba {
	r: number;
	g: number;
	b: number;
	a: number;
}

const octet = z.number().int().min(0).max(255);

const colorTableSchema = z.record(
	z.string(),
	z.tuple([octet, octet, octet, octet]),
);

export const DEFAULT_COLOR: Readonly<Rgba> = Object.freeze({
	r: 205,
	g: 205,
	b: 205,
	a: 255,
});

function loadColorTable(): ReadonlyMap<string, Rgba> {
	const url = new URL("../data/hud-colors.json", import.meta.url);
	const parsed = colorTableSchema.parse(
		JSON.parse(readFileSync(url, "utf-8")),
	);
	const table = new Map<string, Rgba>();
	for (const [name, [r, g, b, a]] of Object.entries(parsed)) {
		table.set(name, { r, g, b, a });
	}
	return table;
}

const COLOR_TABLE = loadColorTable();

/**
 * Look up a named HUD color (`HUD_COLOUR_RED`, `HC_DEFAULT`, ...).
 * Returns undefined for names the table does not know.
 */
export function resolveColor(name: string): Rgba | undefined {
	return COLOR_TABLE.get(name);
}

export function isKnownColor(name: string): boolean {
	return COLOR_TABLE.has(name);
}

export function toCss(color: Rgba): string {
	const alpha = Math.round((color.a / 255) * 1000) / 1000;
	return `rgba(${color.r},${color.g},${color.b},${alpha})`;
}
