/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

const BYTE_LIST = /<<([\d\s,]+)>>/g;
const BIT_SPECIFIER = /(?<!")<<[^<>"]*::[^<>"]*>>(?!")/g;
const BRACKETED_LIST = /<<([^<>]+)>>/g;
const DIGIT_COMMA = /(\d),(?=\d)/g;

// Controls that still count as printable text.
const PRINTABLE_CONTROLS = new Set(['\t', '\n', '\r', '\v', '\b', '\f', '\u001b', '\u0007']);

/**
 * Rewrites binary sub-literals into a readable form:
 *
 * - `<<116,105>>` → `"ti"` when every value is a byte and the bytes decode as
 *   printable UTF-8;
 * - `<<_ :: 32>>` → `"<<_ :: 32>>"` unless it is already quoted;
 * - `<<1,300>>` → `<<1, 300>>` for numeric lists that are not byte lists.
 *
 * Byte lists that decode to nothing printable are left untouched. Applying
 * the function twice gives the same result as applying it once.
 */
export function normalizeBinaries(text: string): string {
	const quotedBytes = text.replace(BYTE_LIST, (match, inner: string) => {
		const decoded = decodePrintable(inner);
		return decoded === null ? match : JSON.stringify(decoded);
	});

	const quotedSpecifiers = quotedBytes.replace(BIT_SPECIFIER, match => JSON.stringify(match.trim()));

	return quotedSpecifiers.replace(BRACKETED_LIST, (match, inner: string) =>
		parseByteValues(inner) === null ? match.replace(DIGIT_COMMA, '$1, ') : match,
	);
}

function parseByteValues(inner: string): number[] | null {
	const parts = inner
		.split(',')
		.map(part => part.trim())
		.filter(part => part !== '');
	if (parts.length === 0) return null;

	const values: number[] = [];
	for (const part of parts) {
		if (!/^\d+$/.test(part)) return null;
		const value = Number(part);
		if (value > 255) return null;
		values.push(value);
	}
	return values;
}

function decodePrintable(inner: string): string | null {
	const values = parseByteValues(inner);
	if (values === null) return null;

	let decoded: string;
	try {
		decoded = new TextDecoder('utf-8', { fatal: true }).decode(Uint8Array.from(values));
	} catch {
		return null;
	}
	return isPrintable(decoded) ? decoded : null;
}

function isPrintable(text: string): boolean {
	for (const ch of text) {
		const code = ch.codePointAt(0) ?? 0;
		if (code < 0x20 && !PRINTABLE_CONTROLS.has(ch)) return false;
		if (code >= 0x7f && code < 0xa0) return false;
	}
	return true;
}
