/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { findMatchingClose, scanLiteral, splitTopLevel } from './literal_scanner.js';

/**
 * The structural shapes a literal can take at its outermost level.
 */
export enum LiteralKind {
	/** `%{...}` whose closing brace is the last character. */
	MAP,
	/** `(args) :: return`. */
	CALL_SIGNATURE,
	/** `(...)` whose closing paren is the last character. */
	PARENTHESIZED,
	/** Anything else. */
	PLAIN,
}

export type LiteralShape =
	| { kind: LiteralKind.MAP; text: string; segments: string[] }
	| { kind: LiteralKind.CALL_SIGNATURE; text: string; args: string; returns: string }
	| { kind: LiteralKind.PARENTHESIZED; text: string; inner: string }
	| { kind: LiteralKind.PLAIN; text: string };

export interface MapEntry {
	key: string;
	value: string;
}

export interface CallSignature {
	args: string;
	returns: string;
}

/** Placeholder entry printed for omitted map content. */
export const ELISION = '...';

const MAP_OPEN = '%{';
const SIGNATURE_SEPARATOR = '::';

/**
 * Classifies the outermost structure of `text` (trimmed) in one scan.
 *
 * Only real bracket matching counts: `(a) | (b)` is plain, not
 * parenthesized, and `%{a} | %{b}` is not a map. Map segments are returned
 * trimmed with empty ones dropped; elisions are kept.
 */
export function classifyLiteral(text: string): LiteralShape {
	const trimmed = text.trim();
	const tokens = scanLiteral(trimmed);

	if (trimmed.startsWith('(')) {
		const close = findMatchingClose(tokens, 0);
		if (close < 0) return { kind: LiteralKind.PLAIN, text: trimmed };

		const inner = trimmed.slice(1, tokens[close].start).trim();
		if (close === tokens.length - 1) {
			return { kind: LiteralKind.PARENTHESIZED, text: trimmed, inner };
		}

		const rest = trimmed.slice(tokens[close].start + 1).trimStart();
		if (rest.startsWith(SIGNATURE_SEPARATOR)) {
			return {
				kind: LiteralKind.CALL_SIGNATURE,
				text: trimmed,
				args: inner,
				returns: rest.slice(SIGNATURE_SEPARATOR.length).trim(),
			};
		}
		return { kind: LiteralKind.PLAIN, text: trimmed };
	}

	if (trimmed.startsWith(MAP_OPEN)) {
		const openIndex = tokens.findIndex(token => token.start === 1);
		const close = findMatchingClose(tokens, openIndex);
		if (close === tokens.length - 1) {
			const inner = trimmed.slice(MAP_OPEN.length, tokens[close].start);
			const segments = splitTopLevel(inner)
				.map(segment => segment.trim())
				.filter(segment => segment !== '');
			return { kind: LiteralKind.MAP, text: trimmed, segments };
		}
	}

	return { kind: LiteralKind.PLAIN, text: trimmed };
}

/** True when `text` is itself a bare map literal (no wrapping parentheses). */
export function isMapLiteral(text: string): boolean {
	return classifyLiteral(text).kind === LiteralKind.MAP;
}

function unwrapParentheses(shape: LiteralShape): LiteralShape {
	return shape.kind === LiteralKind.PARENTHESIZED ? classifyLiteral(shape.inner) : shape;
}

/**
 * Extracts the `key => value` entries of a map literal, optionally wrapped in
 * one layer of parentheses.
 *
 * Entries keep the order in which each key first appears; when a key repeats,
 * the later value wins.
 *
 * @returns The entries, or `null` when `text` is not a map or one of its
 *   segments has no `=>`.
 * @example
 * parseMapLiteral('(%{a => 1, b => %{c => 2}})');
 * // [{ key: 'a', value: '1' }, { key: 'b', value: '%{c => 2}' }]
 */
export function parseMapLiteral(text: string): MapEntry[] | null {
	const shape = unwrapParentheses(classifyLiteral(text));
	if (shape.kind !== LiteralKind.MAP) return null;

	const values = new Map<string, string>();
	for (const segment of shape.segments) {
		if (segment === ELISION) continue;

		const arrow = segment.indexOf('=>');
		if (arrow < 0) return null;
		values.set(segment.slice(0, arrow).trim(), segment.slice(arrow + 2).trim());
	}

	return Array.from(values, ([key, value]) => ({ key, value }));
}

/**
 * Splits `(args) :: return` into its two components, after unwrapping one
 * outer layer of parentheses.
 */
export function parseCallSignature(text: string): CallSignature | null {
	const shape = unwrapParentheses(classifyLiteral(text));
	if (shape.kind !== LiteralKind.CALL_SIGNATURE) return null;
	return { args: shape.args, returns: shape.returns };
}

/** Indexes entries by key, keeping their order. */
export function entriesByKey(entries: MapEntry[]): Map<string, string> {
	const values = new Map<string, string>();
	for (const { key, value } of entries) values.set(key, value);
	return values;
}
