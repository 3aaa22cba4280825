/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { colorize } from './ansi_style.js';
import { normalizeBinaries } from './binary_normalizer.js';
import { balanceLine } from './literal_scanner.js';
import { prettyMultiline } from './pretty_printer.js';

/**
 * Which side of the pair a display line belongs to.
 */
export enum DiffLineKind {
	/** Present in the expected text only. */
	DELETION,
	/** Present in the actual text only. */
	INSERTION,
}

/**
 * A ready-to-print display line: marker, indentation and styling included.
 */
export interface DiffLine {
	kind: DiffLineKind;
	text: string;
}

/**
 * Configuration options for the structural differ.
 */
export interface LiteralDiffOptions {
	/** Emits terminal colors: red deletions, green insertions, yellow highlights. */
	color?: boolean;
	/** Names of registered strategies to try, in order, before the line diff. */
	strategies?: string[];
	/** Nesting depth beyond which literals are no longer expanded or recursed into. */
	maxDepth?: number;
	/** Enables verbose logging in development builds. */
	debug?: boolean;
}

const MARKERS: Readonly<Record<DiffLineKind, string>> = {
	[DiffLineKind.DELETION]: '-  ',
	[DiffLineKind.INSERTION]: '+  ',
};

/**
 * Turns one side's text into display lines.
 *
 * The text is pretty-printed; the marker goes on the first line and the
 * remaining lines are indented by its width. A result that fits on one line
 * is closed with whatever brackets it still owes.
 */
export function renderDiffLine(kind: DiffLineKind, text: string, config: Required<LiteralDiffOptions>): DiffLine[] {
	const marker = MARKERS[kind];
	const color = kind === DiffLineKind.DELETION ? 'red' : 'green';
	const lines = prettyMultiline(text, config.maxDepth);

	if (lines.length === 1) {
		return [{ kind, text: colorize(balanceLine(marker + lines[0]), color, config.color) }];
	}

	const continuation = ' '.repeat(marker.length);
	return lines.map((line, i) => ({
		kind,
		text: colorize((i === 0 ? marker : continuation) + line, color, config.color),
	}));
}

/** `key => value`, with binaries in the result normalized. */
export function entryLine(key: string, value: string): string {
	return normalizeBinaries(`${key} => ${value}`);
}

/**
 * A structural diff strategy. Receives the non-empty lines of both sides and
 * returns the display lines, or `null` when the input is not its shape.
 */
export type LiteralDiffStrategy = (
	expected: string[],
	actual: string[],
	config: Required<LiteralDiffOptions>
) => DiffLine[] | null;
