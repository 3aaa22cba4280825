/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import stripAnsi from 'strip-ansi';

export type StyleColor = 'red' | 'green' | 'yellow';

const SGR: Readonly<Record<StyleColor, string>> = {
	red: '\u001b[31m',
	green: '\u001b[32m',
	yellow: '\u001b[33m',
};

export const RESET = '\u001b[0m';

const LEADING_ESCAPES = /^(?:\u001b\[[0-9;]*m)+/;
const TRAILING_ESCAPES = /(?:\u001b\[[0-9;]*m)+$/;

/**
 * Escape runs peeled off both ends of a literal, so structural passes see
 * only its content.
 */
export interface StyleWrapper {
	leading: string;
	content: string;
	trailing: string;
}

/**
 * Wraps `text` in the SGR code for `color`. Every reset already inside the
 * text is followed by the code again, so a nested highlight does not end the
 * outer color early.
 */
export function colorize(text: string, color: StyleColor, enabled: boolean): string {
	if (!enabled) return text;
	const code = SGR[color];
	return code + text.split(RESET).join(RESET + code) + RESET;
}

/** Removes every terminal escape sequence. */
export function stripStyles(text: string): string {
	return stripAnsi(text);
}

export function extractStyleWrapper(text: string): StyleWrapper {
	const leading = LEADING_ESCAPES.exec(text)?.[0] ?? '';
	const rest = text.slice(leading.length);
	const trailing = TRAILING_ESCAPES.exec(rest)?.[0] ?? '';
	return { leading, content: rest.slice(0, rest.length - trailing.length), trailing };
}
