import { findShortFormats, findVariables } from "./tokenizer.js";

export interface FormattingSignature {
	/** Distinct short-format literals, in order of first appearance. */
	required: string[];
	/** Last short-format literal; absent when the reference uses none. */
	terminal?: string;
	/** `{N}` literals in order, duplicates kept. */
	variables: string[];
}

export const EMPTY_SIGNATURE: Readonly<FormattingSignature> = {
	required: [],
	variables: [],
};

export function extractSignature(referenceText: string): FormattingSignature {
	const formats = findShortFormats(referenceText).map((m) => m.literal);
	const variables = findVariables(referenceText).map((m) => m.literal);
	const last = formats.at(-1);

	if (last === undefined) {
		return { required: [], variables };
	}
	return { required: [...new Set(formats)], terminal: last, variables };
}

export function hasFormattingRequirement(
	signature: FormattingSignature,
): signature is FormattingSignature & { terminal: string } {
	return signature.terminal !== undefined;
}
