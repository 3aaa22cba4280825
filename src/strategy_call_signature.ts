/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { type DiffLine, DiffLineKind, type LiteralDiffOptions, renderDiffLine } from './diff_line.js';
import { parseCallSignature } from './literal_shape.js';
import { diffSegments } from './segment_highlighter.js';

/**
 * Diffs two `(args) :: return` signatures, highlighting the arguments and
 * the return type separately.
 *
 * @returns `null` unless both sides are a single call signature.
 */
export function diffCallSignatures(
	expected: string[],
	actual: string[],
	config: Required<LiteralDiffOptions>
): DiffLine[] | null {
	if (expected.length !== 1 || actual.length !== 1) return null;

	const expectedSignature = parseCallSignature(expected[0]);
	const actualSignature = parseCallSignature(actual[0]);
	if (expectedSignature === null || actualSignature === null) return null;

	const args = diffSegments(expectedSignature.args, actualSignature.args, config.color);
	const returns = diffSegments(expectedSignature.returns, actualSignature.returns, config.color);

	return [
		...renderDiffLine(DiffLineKind.DELETION, `(${args.expectedLine}) :: ${returns.expectedLine}`, config),
		...renderDiffLine(DiffLineKind.INSERTION, `(${args.actualLine}) :: ${returns.actualLine}`, config),
	];
}
