/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { type DiffLine, DiffLineKind, entryLine, type LiteralDiffOptions, renderDiffLine } from './diff_line.js';
import { entriesByKey, isMapLiteral, parseMapLiteral } from './literal_shape.js';
import { diffSegments, highlightSegment, type SegmentDiff } from './segment_highlighter.js';

type Side = 'expected' | 'actual';

function sideLine(segments: SegmentDiff, side: Side): string {
	return side === 'expected' ? segments.expectedLine : segments.actualLine;
}

/**
 * Diffs two single-line map literals key by key.
 *
 * Keys are visited in expected order, then the keys only the actual map
 * has. A key missing on one side gives one highlighted line for the side
 * that has it; a changed value gives a deletion and an insertion. Values
 * that are both maps are re-rendered in full on each side, highlighting
 * entry by entry.
 *
 * @returns `null` unless both sides are a single map literal.
 */
export function diffMapEntries(
	expected: string[],
	actual: string[],
	config: Required<LiteralDiffOptions>
): DiffLine[] | null {
	if (expected.length !== 1 || actual.length !== 1) return null;

	const expectedEntries = parseMapLiteral(expected[0]);
	const actualEntries = parseMapLiteral(actual[0]);
	if (expectedEntries === null || actualEntries === null) return null;

	const expectedValues = entriesByKey(expectedEntries);
	const actualValues = entriesByKey(actualEntries);
	const keys = [
		...expectedValues.keys(),
		...[...actualValues.keys()].filter(key => !expectedValues.has(key)),
	];

	return keys.flatMap(key => {
		const expectedValue = expectedValues.get(key);
		const actualValue = actualValues.get(key);

		if (expectedValue === undefined) {
			return actualValue === undefined
				? []
				: renderDiffLine(DiffLineKind.INSERTION, entryLine(key, highlightSegment(actualValue, config.color)), config);
		}
		if (actualValue === undefined) {
			return renderDiffLine(DiffLineKind.DELETION, entryLine(key, highlightSegment(expectedValue, config.color)), config);
		}
		if (expectedValue === actualValue) return [];

		const [expectedLine, actualLine] = changedValueLines(expectedValue, actualValue, config);
		return [
			...renderDiffLine(DiffLineKind.DELETION, entryLine(key, expectedLine), config),
			...renderDiffLine(DiffLineKind.INSERTION, entryLine(key, actualLine), config),
		];
	});
}

function changedValueLines(
	expectedValue: string,
	actualValue: string,
	config: Required<LiteralDiffOptions>
): [string, string] {
	if (isMapLiteral(expectedValue) && isMapLiteral(actualValue)) {
		return [
			renderMapSide(expectedValue, actualValue, 'expected', config, 1),
			renderMapSide(expectedValue, actualValue, 'actual', config, 1),
		];
	}
	const segments = diffSegments(expectedValue, actualValue, config.color);
	return [segments.expectedLine, segments.actualLine];
}

/**
 * Renders one side of a pair of nested maps in that side's own key order,
 * with each entry highlighted against its counterpart. Entries the other
 * side lacks are printed as they are.
 */
function renderMapSide(
	expected: string,
	actual: string,
	side: Side,
	config: Required<LiteralDiffOptions>,
	depth: number
): string {
	const expectedEntries = parseMapLiteral(expected);
	const actualEntries = parseMapLiteral(actual);
	if (expectedEntries === null || actualEntries === null || depth >= config.maxDepth) {
		return sideLine(diffSegments(expected, actual, config.color), side);
	}

	const expectedValues = entriesByKey(expectedEntries);
	const actualValues = entriesByKey(actualEntries);
	const own = side === 'expected' ? expectedEntries : actualEntries;

	const rendered = own.map(({ key, value }) => {
		const expectedValue = expectedValues.get(key);
		const actualValue = actualValues.get(key);
		if (expectedValue === undefined || actualValue === undefined) {
			return `${key} => ${value}`;
		}
		if (isMapLiteral(expectedValue) && isMapLiteral(actualValue)) {
			return `${key} => ${renderMapSide(expectedValue, actualValue, side, config, depth + 1)}`;
		}
		return `${key} => ${sideLine(diffSegments(expectedValue, actualValue, config.color), side)}`;
	});

	return `%{${rendered.join(', ')}}`;
}
