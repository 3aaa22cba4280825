/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { normalizeBinaries } from './binary_normalizer.js';

const __DEV__ = false;

export interface TermLineOptions {
	/** Reformats the raw term text before it is split, e.g. an external type printer. */
	prettyPrinter?: (text: string) => string;
	/** Enables verbose logging in development builds. */
	debug?: boolean;
}

/**
 * Prepares a rendered term for diffing or display: runs the optional
 * pretty-printer, normalizes binaries, then splits it into non-empty lines.
 *
 * A pretty-printer that throws leaves the text as it was.
 *
 * @example
 * formatTermLines('%{title => <<116,105,116,108,101>>}'); // ['%{title => "title"}']
 */
export function formatTermLines(text: string | null | undefined, options: TermLineOptions = {}): string[] {
	if (text === null || text === undefined) return [];

	return normalizeBinaries(applyPrettyPrinter(text, options))
		.trim()
		.split(/\r?\n/)
		.filter(line => line !== '');
}

function applyPrettyPrinter(text: string, options: TermLineOptions): string {
	const { prettyPrinter, debug = false } = options;
	if (prettyPrinter === undefined) return text;

	try {
		return prettyPrinter(text);
	} catch (error) {
		if (__DEV__ && debug) {
			console.warn(`[formatTermLines] pretty-printer failed, using the raw text:`, error);
		}
		return text;
	}
}
