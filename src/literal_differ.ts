/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { normalizeBinaries } from './binary_normalizer.js';
import { type DiffLine, type LiteralDiffOptions, type LiteralDiffStrategy } from './diff_line.js';
import { MyersLineDiff } from './myers_line_diff.js';
import { DEFAULT_MAX_DEPTH } from './pretty_printer.js';
import { diffCallSignatures } from './strategy_call_signature.js';
import { diffByLines } from './strategy_lines.js';
import { diffMapEntries } from './strategy_map_entries.js';

const __DEV__ = false;

const LINE_BREAK = /\r?\n/;

/**
 * Structural differ for nested literals.
 *
 * Each registered strategy named in `options.strategies` is tried in order;
 * the first one that recognizes the pair produces the result. The Myers line
 * diff handles whatever no strategy claims.
 */
export class LiteralDiffer {
	private static strategyRegistry = new Map<string, LiteralDiffStrategy>();
	private static isDefaultRegistered = false;
	public static readonly defaultOptions: Required<LiteralDiffOptions> = {
		color: false,
		strategies: ['mapEntries', 'callSignature'],
		maxDepth: DEFAULT_MAX_DEPTH,
		debug: false,
	};

	/**
	 * Registers the built-in strategies once.
	 * @private
	 * @static
	 */
	private static ensureDefaultStrategiesRegistered(): void {
		if (!LiteralDiffer.isDefaultRegistered) {
			LiteralDiffer.registerStrategy('mapEntries', diffMapEntries);
			LiteralDiffer.registerStrategy('callSignature', diffCallSignatures);
			LiteralDiffer.isDefaultRegistered = true;
		}
	}

	/**
	 * Registers a diffing strategy under `name`, replacing any strategy
	 * already registered under it.
	 * @public
	 * @static
	 */
	public static registerStrategy(name: string, strategyFn: LiteralDiffStrategy): void {
		if (__DEV__) {
			console.log(`[LiteralDiffer] Registering strategy: '${name}'`);
		}
		LiteralDiffer.strategyRegistry.set(name, strategyFn);
	}

	private readonly lineDiff = new MyersLineDiff();

	constructor() {
		LiteralDiffer.ensureDefaultStrategiesRegistered();
	}

	/**
	 * Diffs an expected literal against the actual one.
	 *
	 * Both inputs have their binaries normalized and are split into
	 * non-empty lines first.
	 *
	 * @returns Deletion lines for the expected side and insertion lines for
	 *   the actual side, in display order. Identical inputs give `[]`.
	 * @public
	 */
	public diff(expected: string, actual: string, options?: LiteralDiffOptions): DiffLine[] {
		const config: Required<LiteralDiffOptions> = {
			...LiteralDiffer.defaultOptions,
			...options,
		};

		const expectedLines = toLiteralLines(expected);
		const actualLines = toLiteralLines(actual);

		if (__DEV__ && config.debug) {
			console.group(`[LiteralDiffer] ${expectedLines.length} vs ${actualLines.length} lines`);
		}

		for (const name of config.strategies) {
			const strategyFn = LiteralDiffer.strategyRegistry.get(name);
			if (strategyFn === undefined) {
				if (__DEV__ && config.debug) console.log(`Strategy '${name}' is not registered, skipping.`);
				continue;
			}

			const result = strategyFn(expectedLines, actualLines, config);
			if (result !== null) {
				if (__DEV__ && config.debug) {
					console.log(`Strategy '${name}' produced ${result.length} lines.`);
					console.groupEnd();
				}
				return result;
			}
		}

		const result = diffByLines(this.lineDiff, expectedLines, actualLines, config);
		if (__DEV__ && config.debug) {
			console.log(`Line diff produced ${result.length} lines.`);
			console.groupEnd();
		}
		return result;
	}

	/**
	 * Same as {@link diff}, returning only the printable texts.
	 * @public
	 */
	public diffLines(expected: string, actual: string, options?: LiteralDiffOptions): string[] {
		return this.diff(expected, actual, options).map(line => line.text);
	}
}

function toLiteralLines(text: string): string[] {
	return normalizeBinaries(text)
		.split(LINE_BREAK)
		.filter(line => line.trim() !== '');
}

/** Shorthand for `new LiteralDiffer().diff(...)`. */
export function diffLiterals(expected: string, actual: string, options?: LiteralDiffOptions): DiffLine[] {
	return new LiteralDiffer().diff(expected, actual, options);
}

/** Shorthand for `new LiteralDiffer().diffLines(...)`. */
export function diffLines(expected: string, actual: string, options?: LiteralDiffOptions): string[] {
	return new LiteralDiffer().diffLines(expected, actual, options);
}
