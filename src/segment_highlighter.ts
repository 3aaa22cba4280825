/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { colorize } from './ansi_style.js';
import { scanLiteral, splitTopLevel, TokenKind, unmatchedClosers } from './literal_scanner.js';
import { ELISION } from './literal_shape.js';

/**
 * The split of an expected/actual pair into a shared prefix, the differing
 * middle of each side and each side's suffix.
 *
 * `prefix + expectedDiff + expectedSuffix` is always the expected text, and
 * likewise for the actual side.
 */
export interface DiffSegment {
	prefix: string;
	expectedDiff: string;
	actualDiff: string;
	expectedSuffix: string;
	actualSuffix: string;
}

export interface SegmentDiff extends DiffSegment {
	/** `expectedDiff` in the highlight color, or `''` when it is empty. */
	highlightedExpectedDiff: string;
	highlightedActualDiff: string;
	/** `prefix + highlightedExpectedDiff + expectedSuffix`. */
	expectedLine: string;
	actualLine: string;
}

/** The two display lines produced for an inline pair. */
export interface SegmentLines {
	expectedLine: string;
	actualLine: string;
}

const WHITESPACE = /\s/;
const SHARED_CLOSERS = new Set([')', ']', '}']);
const NAMED_OPEN = /%([A-Za-z0-9_.!]*)$/;
const NAMED_STRUCT = /^%([A-Za-z0-9_.!]+)\{/;

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

function splitGraphemes(text: string): string[] {
	return Array.from(graphemes.segment(text), part => part.segment);
}

/**
 * Locates the differing middle of two literals and highlights it.
 *
 * The common prefix is measured in code points and the common suffix in
 * graphemes. Each side's diff then pulls back the closers it owes from the
 * front of its suffix (skipping only whitespace), and a run of closers both
 * diffs end with is handed back to the suffixes, so highlighting never
 * swallows a shared closing bracket.
 *
 * @example
 * diffSegments('(atom())', '(binary())', false);
 * // prefix '(', expectedDiff 'atom', actualDiff 'binary', suffixes '())'
 */
export function diffSegments(expected: string, actual: string, color: boolean): SegmentDiff {
	const expectedPoints = Array.from(expected);
	const actualPoints = Array.from(actual);
	let prefixLen = 0;
	while (
		prefixLen < expectedPoints.length &&
		prefixLen < actualPoints.length &&
		expectedPoints[prefixLen] === actualPoints[prefixLen]
	) {
		prefixLen++;
	}
	const prefix = expectedPoints.slice(0, prefixLen).join('');

	const expectedRest = splitGraphemes(expectedPoints.slice(prefixLen).join(''));
	const actualRest = splitGraphemes(actualPoints.slice(prefixLen).join(''));
	let suffixLen = 0;
	while (
		suffixLen < expectedRest.length &&
		suffixLen < actualRest.length &&
		expectedRest[expectedRest.length - 1 - suffixLen] === actualRest[actualRest.length - 1 - suffixLen]
	) {
		suffixLen++;
	}

	const expectedSide = rebalance(
		prefix,
		expectedRest.slice(0, expectedRest.length - suffixLen).join(''),
		expectedRest.slice(expectedRest.length - suffixLen).join(''),
	);
	const actualSide = rebalance(
		prefix,
		actualRest.slice(0, actualRest.length - suffixLen).join(''),
		actualRest.slice(actualRest.length - suffixLen).join(''),
	);

	const shared = sharedTrailingClosers(expectedSide.diff, actualSide.diff);
	const expectedDiff = expectedSide.diff.slice(0, expectedSide.diff.length - shared.length);
	const actualDiff = actualSide.diff.slice(0, actualSide.diff.length - shared.length);
	const expectedSuffix = shared + expectedSide.suffix;
	const actualSuffix = shared + actualSide.suffix;

	const highlightedExpectedDiff = highlightSegment(expectedDiff, color);
	const highlightedActualDiff = highlightSegment(actualDiff, color);

	return {
		prefix,
		expectedDiff,
		actualDiff,
		expectedSuffix,
		actualSuffix,
		highlightedExpectedDiff,
		highlightedActualDiff,
		expectedLine: prefix + highlightedExpectedDiff + expectedSuffix,
		actualLine: prefix + highlightedActualDiff + actualSuffix,
	};
}

/** Wraps non-empty text in the highlight color. */
export function highlightSegment(text: string, color: boolean): string {
	return text === '' ? '' : colorize(text, 'yellow', color);
}

function rebalance(prefix: string, diff: string, suffix: string): { diff: string; suffix: string } {
	const owed = unmatchedClosers(prefix + diff);
	if (owed.length === 0) return { diff, suffix };

	let end = 0;
	for (const closer of owed) {
		let pos = end;
		while (pos < suffix.length && WHITESPACE.test(suffix[pos])) pos++;
		if (suffix[pos] !== closer) break;
		end = pos + 1;
	}
	return { diff: diff + suffix.slice(0, end), suffix: suffix.slice(end) };
}

function sharedTrailingClosers(expectedDiff: string, actualDiff: string): string {
	let len = 0;
	while (len < expectedDiff.length && len < actualDiff.length) {
		const ch = expectedDiff[expectedDiff.length - 1 - len];
		if (!SHARED_CLOSERS.has(ch) || ch !== actualDiff[actualDiff.length - 1 - len]) break;
		len++;
	}
	return expectedDiff.slice(expectedDiff.length - len);
}

/**
 * Finds the map or named structure `prefix` leaves open and the field whose
 * value the diff falls in. `valueStart` is where that value begins in the
 * prefix, so a diff that starts part-way through a value still compacts.
 */
function openField(prefix: string): { opener: string; field: string; valueStart: number } | null {
	const open: { start: number; name: string | null }[] = [];
	for (const token of scanLiteral(prefix)) {
		if (token.kind === TokenKind.OPEN && token.family === 'brace') {
			const named = NAMED_OPEN.exec(prefix.slice(0, token.start));
			open.push({ start: token.start, name: named === null ? null : named[1] });
		} else if (token.kind === TokenKind.CLOSE && token.family === 'brace') {
			open.pop();
		}
	}

	const literals = open.filter(brace => brace.name !== null);
	if (literals.length === 0) return null;

	// The raw segment running up to the end of the prefix is the entry the diff starts in.
	const innermost = literals[literals.length - 1];
	const segments = splitTopLevel(prefix.slice(innermost.start + 1));
	const entry = segments[segments.length - 1];
	const arrow = entry.indexOf('=>');
	if (arrow < 0) return null;

	const field = entry.slice(0, arrow).trim();
	if (field === '' || field === ELISION) return null;

	let valueStart = prefix.length - entry.length + arrow + 2;
	while (valueStart < prefix.length && WHITESPACE.test(prefix[valueStart])) valueStart++;

	const structs = literals.filter(brace => brace.name !== '');
	const opener = structs.length > 0 ? `%${structs[0].name}{` : '%{';
	return { opener, field, valueStart };
}

/**
 * Reads the entry value starting at `from`, up to the next comma or closer
 * at its own depth.
 */
function fieldValue(text: string, from: number): string {
	const rest = text.slice(from);
	let depth = 0;
	for (const token of scanLiteral(rest)) {
		if (token.kind === TokenKind.OPEN) {
			depth++;
		} else if (token.kind === TokenKind.CLOSE) {
			if (depth === 0) return rest.slice(0, token.start).trimEnd();
			depth--;
		} else if (token.kind === TokenKind.COMMA && depth === 0) {
			return rest.slice(0, token.start).trimEnd();
		}
	}
	return rest.trimEnd();
}

/**
 * Renders a pair whose diff sits in one field of a map or named structure
 * as `(%Name{..., field => value})`, dropping the surrounding context. The
 * whole value of the field is highlighted on each side; `%Name` is the
 * outermost named structure left open.
 *
 * @returns The compacted lines, or `null` when the diff does not start
 *   inside the value of a map field.
 */
export function compactSegments(segments: SegmentDiff, color: boolean = false): SegmentLines | null {
	const target = openField(segments.prefix);
	if (target === null) return null;

	const expectedValue = fieldValue(segments.prefix + segments.expectedDiff + segments.expectedSuffix, target.valueStart);
	const actualValue = fieldValue(segments.prefix + segments.actualDiff + segments.actualSuffix, target.valueStart);

	// A diff running past the value would lose changes in later entries.
	const valueEnd = (value: string): number => target.valueStart + value.length;
	if (
		valueEnd(expectedValue) < segments.prefix.length + segments.expectedDiff.length ||
		valueEnd(actualValue) < segments.prefix.length + segments.actualDiff.length
	) {
		return null;
	}

	const render = (value: string): string =>
		`(${target.opener}${ELISION}, ${target.field} => ${highlightSegment(value, color)}})`;
	return {
		expectedLine: render(expectedValue),
		actualLine: render(actualValue),
	};
}

/**
 * Collapses every balanced named structure `%Name{...}` to `%Name{...}`,
 * except those whose span overlaps `[keepFrom, keepTo)`. An empty range
 * keeps the structures that enclose its position.
 */
export function shrinkStructs(line: string, keepFrom: number = line.length, keepTo: number = keepFrom): string {
	let out = '';
	let i = 0;
	while (i < line.length) {
		const match = line[i] === '%' ? NAMED_STRUCT.exec(line.slice(i)) : null;
		const close = match === null ? -1 : matchingBrace(line, i + match[0].length);
		if (match === null || close < 0 || (i < keepTo && close >= keepFrom)) {
			out += line[i];
			i++;
			continue;
		}
		out += `${match[0]}${ELISION}}`;
		i = close + 1;
	}
	return out;
}

function matchingBrace(text: string, from: number): number {
	let depth = 1;
	for (let i = from; i < text.length; i++) {
		if (text[i] === '{') depth++;
		else if (text[i] === '}' && --depth === 0) return i;
	}
	return -1;
}
