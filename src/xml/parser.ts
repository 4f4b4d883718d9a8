import { SaxesParser, type SaxesTag } from "saxes";
import type { SourcePosition } from "../types.js";

/** Immutable element tree with the positions diagnostics point at. */
export interface XmlElement {
	name: string;
	attributes: Record<string, string>;
	children: XmlElement[];
	/** Concatenated direct text content. */
	text: string;
	/** The `<` of the opening tag. */
	position: SourcePosition;
	/** First character after the opening tag's `>`. */
	textPosition: SourcePosition;
}

export class XmlParseError extends Error {
	readonly position?: SourcePosition;

	constructor(message: string, position?: SourcePosition) {
		super(message);
		this.name = "XmlParseError";
		this.position = position;
	}
}

interface MutableXmlElement {
	name: string;
	attributes: Record<string, string>;
	children: MutableXmlElement[];
	text: string;
	position: SourcePosition;
	textPosition: SourcePosition;
}

/**
 * Parse an XML document into an element tree. Offsets saxes reports are mapped
 * back onto the raw text so columns match what an editor shows.
 */
export function parseXml(xmlText: string, fileName?: string): XmlElement {
	const parser = new SaxesParser({
		xmlns: true,
		position: true,
		fileName,
	});
	const locate = createLocator(xmlText);

	let root: MutableXmlElement | undefined;
	const stack: MutableXmlElement[] = [];
	const tagStarts: number[] = [];
	let parseError: XmlParseError | undefined;

	parser.on("error", (error) => {
		if (!parseError) {
			const { line, column } = parser;
			parseError = new XmlParseError(stripLocation(error.message, line, column, fileName), {
				line,
				column,
			});
		}
	});

	parser.on("opentagstart", () => {
		tagStarts.push(Math.max(0, xmlText.lastIndexOf("<", parser.position - 1)));
	});

	parser.on("opentag", (tag) => {
		const start = tagStarts.pop() ?? parser.position;
		const parent = stack.at(-1);
		const element: MutableXmlElement = {
			name: tag.name,
			attributes: toAttributeMap(tag),
			children: [],
			text: "",
			position: locate(start),
			textPosition: locate(parser.position),
		};

		if (parent) {
			parent.children.push(element);
		} else {
			root = element;
		}

		stack.push(element);
	});

	parser.on("text", (text) => {
		const current = stack.at(-1);
		if (current) current.text += text;
	});

	parser.on("cdata", (text) => {
		const current = stack.at(-1);
		if (current) current.text += text;
	});

	parser.on("closetag", () => {
		stack.pop();
	});

	parser.write(xmlText).close();

	if (parseError) {
		throw parseError;
	}

	if (!root) {
		throw new XmlParseError("No XML root element found");
	}

	return freeze(root);
}

function toAttributeMap(tag: SaxesTag): Record<string, string> {
	const out: Record<string, string> = {};
	for (const [key, value] of Object.entries(tag.attributes)) {
		out[key] = typeof value === "string" ? value : value.value;
	}
	return out;
}

/** saxes prefixes its messages with `file:line:column: `; the diagnostic carries those already. */
function stripLocation(
	message: string,
	line: number,
	column: number,
	fileName?: string,
): string {
	const prefix = `${fileName ? `${fileName}:` : ""}${line}:${column}: `;
	return message.startsWith(prefix) ? message.slice(prefix.length) : message;
}

function createLocator(text: string): (offset: number) => SourcePosition {
	// A byte order mark takes no column.
	const lineStarts = [text.startsWith("\uFEFF") ? 1 : 0];
	for (let i = text.indexOf("\n"); i !== -1; i = text.indexOf("\n", i + 1)) {
		lineStarts.push(i + 1);
	}

	return (offset) => {
		let low = 0;
		let high = lineStarts.length - 1;
		while (low < high) {
			const mid = (low + high + 1) >> 1;
			if (lineStarts[mid] <= offset) {
				low = mid;
			} else {
				high = mid - 1;
			}
		}
		return { line: low + 1, column: offset - lineStarts[low] + 1 };
	};
}

function freeze(element: MutableXmlElement): XmlElement {
	return {
		name: element.name,
		attributes: element.attributes,
		children: element.children.map(freeze),
		text: element.text,
		position: element.position,
		textPosition: element.textPosition,
	};
}
