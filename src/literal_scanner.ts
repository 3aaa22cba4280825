/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { stripStyles } from './ansi_style.js';

/**
 * Enumerates the kinds of tokens emitted by the literal scanner.
 */
export enum TokenKind {
	/** A run of characters with no structural meaning. */
	TEXT,
	/** An opening delimiter: `{`, `[`, `(` or `<<`. */
	OPEN,
	/** A closing delimiter: `}`, `]`, `)` or `>>`. */
	CLOSE,
	/** A comma, which separates entries when it sits at depth zero. */
	COMMA,
	/** A terminal styling escape (`ESC[...m`), kept as one opaque run. */
	ESCAPE,
}

/** The four bracket families tracked independently. */
export type DelimiterFamily = 'brace' | 'bracket' | 'paren' | 'bits';

/**
 * A single token of literal text. Concatenating the `value` of every token
 * returned by {@link scanLiteral} reproduces the scanned text exactly.
 */
export type LiteralToken =
	| { kind: TokenKind.TEXT | TokenKind.COMMA | TokenKind.ESCAPE; value: string; start: number }
	| { kind: TokenKind.OPEN | TokenKind.CLOSE; value: string; start: number; family: DelimiterFamily };

const ESCAPE_CHAR = '\u001b';

const OPENERS: Readonly<Record<string, DelimiterFamily>> = { '{': 'brace', '[': 'bracket', '(': 'paren' };
const CLOSERS: Readonly<Record<string, DelimiterFamily>> = { '}': 'brace', ']': 'bracket', ')': 'paren' };

/** Closing character for each family that takes part in line balancing. */
export const CLOSER_OF: Readonly<Record<Exclude<DelimiterFamily, 'bits'>, string>> = {
	brace: '}',
	bracket: ']',
	paren: ')',
};

/**
 * Scans literal text into a flat token stream in a single pass.
 *
 * Escape runs start at `ESC[` and end at the first `m` (or the end of the
 * text). `>>` only closes a bit-segment when one is open, so a stray `>>`
 * stays plain text.
 *
 * @example
 * scanLiteral('%{a => <<1,2>>}').map(t => t.value);
 * // ['%', '{', 'a => ', '<<', '1', ',', '2', '>>', '}']
 */
export function scanLiteral(text: string): LiteralToken[] {
	const tokens: LiteralToken[] = [];
	let bitDepth = 0;
	let textStart = -1;

	const flushText = (end: number): void => {
		if (textStart >= 0) {
			tokens.push({ kind: TokenKind.TEXT, value: text.slice(textStart, end), start: textStart });
			textStart = -1;
		}
	};

	let i = 0;
	while (i < text.length) {
		const ch = text[i];
		const next = text[i + 1];

		if (ch === ESCAPE_CHAR && next === '[') {
			flushText(i);
			let end = i + 2;
			while (end < text.length && text[end] !== 'm') end++;
			end = Math.min(end + 1, text.length);
			tokens.push({ kind: TokenKind.ESCAPE, value: text.slice(i, end), start: i });
			i = end;
			continue;
		}

		if (ch === '<' && next === '<') {
			flushText(i);
			tokens.push({ kind: TokenKind.OPEN, value: '<<', start: i, family: 'bits' });
			bitDepth++;
			i += 2;
			continue;
		}

		if (ch === '>' && next === '>' && bitDepth > 0) {
			flushText(i);
			tokens.push({ kind: TokenKind.CLOSE, value: '>>', start: i, family: 'bits' });
			bitDepth--;
			i += 2;
			continue;
		}

		if (ch === ',') {
			flushText(i);
			tokens.push({ kind: TokenKind.COMMA, value: ',', start: i });
			i++;
			continue;
		}

		const opened = OPENERS[ch];
		if (opened !== undefined) {
			flushText(i);
			tokens.push({ kind: TokenKind.OPEN, value: ch, start: i, family: opened });
			i++;
			continue;
		}

		const closed = CLOSERS[ch];
		if (closed !== undefined) {
			flushText(i);
			tokens.push({ kind: TokenKind.CLOSE, value: ch, start: i, family: closed });
			i++;
			continue;
		}

		if (textStart < 0) textStart = i;
		i++;
	}

	flushText(text.length);
	return tokens;
}

/**
 * Finds the token that closes the delimiter opened at `openIndex`, counting
 * only delimiters of the same family.
 *
 * @returns The index of the matching CLOSE token, or -1 when it is missing.
 */
export function findMatchingClose(tokens: LiteralToken[], openIndex: number): number {
	const open = tokens[openIndex];
	if (open === undefined || open.kind !== TokenKind.OPEN) return -1;

	let depth = 0;
	for (let i = openIndex; i < tokens.length; i++) {
		const token = tokens[i];
		if (token.kind === TokenKind.OPEN && token.family === open.family) {
			depth++;
		} else if (token.kind === TokenKind.CLOSE && token.family === open.family) {
			depth--;
			if (depth === 0) return i;
		}
	}
	return -1;
}

/**
 * Splits text on commas that sit outside every bracket family.
 *
 * Each family keeps its own depth counter and a closer only decrements a
 * positive counter, so unmatched closers are ignored. Segments are returned
 * raw: trimming and dropping `""` or `"..."` is left to callers.
 *
 * @example
 * splitTopLevel('a, f(b, c), [d, e]'); // ['a', ' f(b, c)', ' [d, e]']
 */
export function splitTopLevel(text: string): string[] {
	const depth: Record<DelimiterFamily, number> = { brace: 0, bracket: 0, paren: 0, bits: 0 };
	const segments: string[] = [];
	let current = '';

	for (const token of scanLiteral(text)) {
		switch (token.kind) {
			case TokenKind.OPEN:
				depth[token.family]++;
				break;
			case TokenKind.CLOSE:
				if (depth[token.family] > 0) depth[token.family]--;
				break;
			case TokenKind.COMMA:
				if (depth.brace === 0 && depth.bracket === 0 && depth.paren === 0 && depth.bits === 0) {
					segments.push(current);
					current = '';
					continue;
				}
				break;
			default:
				break;
		}
		current += token.value;
	}

	segments.push(current);
	return segments;
}

/**
 * Lists the closers still owed by `text` for `(`, `[` and `{`, innermost
 * first. Styling escapes are stripped before scanning; a closer that does not
 * match the innermost open delimiter is ignored.
 *
 * @example
 * unmatchedClosers('f([x'); // [']', ')']
 */
export function unmatchedClosers(text: string): string[] {
	const stack: Exclude<DelimiterFamily, 'bits'>[] = [];

	for (const token of scanLiteral(stripStyles(text))) {
		if (token.kind !== TokenKind.OPEN && token.kind !== TokenKind.CLOSE) continue;
		if (token.family === 'bits') continue;

		if (token.kind === TokenKind.OPEN) {
			stack.push(token.family);
		} else if (stack.length > 0 && stack[stack.length - 1] === token.family) {
			stack.pop();
		}
	}

	return stack.reverse().map(family => CLOSER_OF[family]);
}

/**
 * Appends whatever closers `line` still owes so it reads as balanced.
 */
export function balanceLine(line: string): string {
	return line + unmatchedClosers(line).join('');
}
