/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

// Structural differ
export { LiteralDiffer, diffLiterals, diffLines } from './literal_differ.js';
export {
	DiffLineKind,
	type DiffLine,
	type LiteralDiffOptions,
	type LiteralDiffStrategy
} from './diff_line.js';

// Built-in strategies
export { diffMapEntries } from './strategy_map_entries.js';
export { diffCallSignatures } from './strategy_call_signature.js';

// Literal structure
export {
	TokenKind,
	scanLiteral,
	splitTopLevel,
	unmatchedClosers,
	balanceLine,
	type LiteralToken,
	type DelimiterFamily
} from './literal_scanner.js';
export {
	LiteralKind,
	classifyLiteral,
	parseMapLiteral,
	parseCallSignature,
	type LiteralShape,
	type MapEntry,
	type CallSignature
} from './literal_shape.js';

// Rendering
export { prettyMultiline, DEFAULT_MAX_DEPTH } from './pretty_printer.js';
export { normalizeBinaries } from './binary_normalizer.js';
export { formatTermLines, type TermLineOptions } from './term_lines.js';
export {
	diffSegments,
	compactSegments,
	shrinkStructs,
	type DiffSegment,
	type SegmentDiff,
	type SegmentLines
} from './segment_highlighter.js';
export { colorize, stripStyles, extractStyleWrapper, type StyleColor, type StyleWrapper } from './ansi_style.js';

// Line engine
export { DiffOperation, MyersLineDiff, type DiffResult, type LineDiffOptions } from './myers_line_diff.js';
