/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { extractStyleWrapper } from './ansi_style.js';
import { classifyLiteral, ELISION, LiteralKind } from './literal_shape.js';

export const DEFAULT_MAX_DEPTH = 32;

const INDENT = '  ';

/**
 * Expands a single-line literal into indented lines.
 *
 * Maps with more than one entry open one entry per line, two spaces per
 * level, with a trailing comma on every entry but the last; elisions are
 * printed but do not count as entries. Parenthesized content is expanded
 * and re-wrapped. Anything else, or anything nested deeper than
 * `maxDepth`, stays on one line. Escape runs wrapping the whole literal go
 * back on the first and last lines.
 *
 * @example
 * prettyMultiline('%{a => 1, b => 2}'); // ['%{', '  a => 1,', '  b => 2', '}']
 */
export function prettyMultiline(text: string, maxDepth: number = DEFAULT_MAX_DEPTH): string[] {
	return prettyLines(text, 0, maxDepth);
}

function prettyLines(text: string, depth: number, maxDepth: number): string[] {
	const { leading, content, trailing } = extractStyleWrapper(text.trim());
	return rewrap(expand(content, depth, maxDepth), leading, trailing);
}

function expand(content: string, depth: number, maxDepth: number): string[] {
	if (depth >= maxDepth) return [content];

	const shape = classifyLiteral(content);
	switch (shape.kind) {
		case LiteralKind.PARENTHESIZED:
			return rewrap(prettyLines(shape.inner, depth + 1, maxDepth), '(', ')');
		case LiteralKind.MAP:
			return formatMap(shape.text, shape.segments, 0, depth, maxDepth);
		default:
			return [content];
	}
}

function rewrap(lines: string[], open: string, close: string): string[] {
	if (lines.length === 1) return [open + lines[0] + close];
	const last = lines.length - 1;
	return lines.map((line, i) => (i === 0 ? open : '') + line + (i === last ? close : ''));
}

function formatMap(text: string, segments: string[], level: number, depth: number, maxDepth: number): string[] {
	const indent = INDENT.repeat(level);
	const entryCount = segments.filter(segment => segment !== ELISION).length;
	if (entryCount <= 1 || depth >= maxDepth) return [indent + text];

	const last = segments.length - 1;
	return [
		`${indent}%{`,
		...segments.flatMap((segment, i) => formatEntry(segment, level + 1, i < last ? ',' : '', depth, maxDepth)),
		`${indent}}`,
	];
}

function formatEntry(entry: string, level: number, suffix: string, depth: number, maxDepth: number): string[] {
	const indent = INDENT.repeat(level);
	const arrow = entry.indexOf('=>');
	if (arrow < 0) return [indent + entry + suffix];

	const key = entry.slice(0, arrow).trimEnd();
	const value = entry.slice(arrow + 2).trimStart();
	const shape = classifyLiteral(value);
	if (shape.kind !== LiteralKind.MAP) return [indent + entry + suffix];

	const nested = formatMap(shape.text, shape.segments, level, depth + 1, maxDepth);
	const lastLine = nested.length - 1;
	return nested.map((line, i) => {
		const head = i === 0 ? `${indent}${key} => ${line.trimStart()}` : line;
		return i === lastLine ? head + suffix : head;
	});
}
