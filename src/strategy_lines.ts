/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { type DiffLine, DiffLineKind, type LiteralDiffOptions, renderDiffLine } from './diff_line.js';
import { DiffOperation, MyersLineDiff } from './myers_line_diff.js';
import { compactSegments, diffSegments, shrinkStructs } from './segment_highlighter.js';

/**
 * The fallback for any input: aligns lines with Myers, then pairs each run
 * of deletions with the insertions next to it, index by index. Paired lines
 * are highlighted inline, and named structures away from the change are
 * shrunk; lines left over are printed as they are.
 */
export function diffByLines(
	engine: MyersLineDiff,
	expected: string[],
	actual: string[],
	config: Required<LiteralDiffOptions>
): DiffLine[] {
	const out: DiffLine[] = [];
	let removed: string[] = [];
	let added: string[] = [];

	const flush = (): void => {
		const paired = Math.min(removed.length, added.length);
		for (let i = 0; i < paired; i++) {
			out.push(...inlineDiffLines(removed[i], added[i], config));
		}
		for (const line of removed.slice(paired)) out.push(...renderDiffLine(DiffLineKind.DELETION, line, config));
		for (const line of added.slice(paired)) out.push(...renderDiffLine(DiffLineKind.INSERTION, line, config));
		removed = [];
		added = [];
	};

	for (const [operation, line] of engine.diff(expected, actual, config.debug)) {
		switch (operation) {
			case DiffOperation.REMOVE:
				removed.push(line);
				break;
			case DiffOperation.ADD:
				added.push(line);
				break;
			case DiffOperation.EQUAL:
				flush();
				break;
		}
	}
	flush();

	return out;
}

function inlineDiffLines(expected: string, actual: string, config: Required<LiteralDiffOptions>): DiffLine[] {
	const segments = diffSegments(expected, actual, config.color);
	const diffStart = segments.prefix.length;
	const lines = compactSegments(segments, config.color) ?? {
		expectedLine: shrinkStructs(segments.expectedLine, diffStart, diffStart + segments.highlightedExpectedDiff.length),
		actualLine: shrinkStructs(segments.actualLine, diffStart, diffStart + segments.highlightedActualDiff.length),
	};
	return [
		...renderDiffLine(DiffLineKind.DELETION, lines.expectedLine, config),
		...renderDiffLine(DiffLineKind.INSERTION, lines.actualLine, config),
	];
}
