/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
const __DEV__ = false;

/**
 * Enumerates the types of operations in a line diff.
 */
export enum DiffOperation {
	/** The line is present on both sides. */
	EQUAL,
	/** The line only exists on the new side. */
	ADD,
	/** The line only exists on the old side. */
	REMOVE,
}

/**
 * A single edit: the operation and the line it applies to.
 * @example [DiffOperation.REMOVE, '%{a => 1}']
 */
export type DiffResult = [DiffOperation, string];

/**
 * Configuration options for the line diff engine.
 */
export interface LineDiffOptions {
	/** Ranges whose combined length (N+M) is below this are solved with the O(ND) trace algorithm. */
	quickDiffThreshold?: number;
	/** If true, skips trimming the common leading and trailing lines. */
	skipTrimming?: boolean;
}

/**
 * Half-open ranges `[oldStart, oldEnd)` and `[newStart, newEnd)` over the
 * interned line ids.
 * @internal
 */
interface LineRange {
	oldStart: number;
	oldEnd: number;
	newStart: number;
	newEnd: number;
}

/**
 * Lines of both sides mapped to integer ids, so comparisons are integer
 * comparisons.
 * @internal
 */
interface InternedLines {
	oldIds: Uint32Array;
	newIds: Uint32Array;
	idToLine: string[];
}

/**
 * Line-level Myers diff.
 *
 * Common leading and trailing lines are peeled off first. Small ranges are
 * solved directly with the O(ND) algorithm and its trace; larger ones are
 * bisected on the middle snake and solved recursively, which keeps memory
 * linear.
 */
export class MyersLineDiff {
	public static readonly defaultOptions: Required<LineDiffOptions> = {
		quickDiffThreshold: 64,
		skipTrimming: false,
	};

	/**
	 * Computes the shortest edit script turning `oldLines` into `newLines`.
	 *
	 * @param debug - Enables verbose logging in development builds.
	 * @returns The edit script; replaying its EQUAL and ADD lines in order yields `newLines`.
	 * @public
	 */
	public diff(
		oldLines: string[],
		newLines: string[],
		debug: boolean = false,
		options?: LineDiffOptions
	): DiffResult[] {
		const config: Required<LineDiffOptions> = {
			...MyersLineDiff.defaultOptions,
			...options,
		};

		if (__DEV__ && debug) {
			console.group(`[MyersLineDiff] ${oldLines.length} → ${newLines.length} lines`);
			console.log(`Options:`, config);
		}

		const lines = this._intern(oldLines, newLines);
		const range: LineRange = { oldStart: 0, oldEnd: oldLines.length, newStart: 0, newEnd: newLines.length };

		const result = config.skipTrimming
			? this._diffRange(lines, range, config, debug)
			: this._diffTrimmed(lines, range, config, debug);

		if (__DEV__ && debug) {
			console.log(`Result: ${result.length} operations`);
			console.groupEnd();
		}
		return result;
	}

	private _intern(oldLines: string[], newLines: string[]): InternedLines {
		const lineToId = new Map<string, number>();
		const idToLine: string[] = [];

		const intern = (source: string[]): Uint32Array => {
			const ids = new Uint32Array(source.length);
			source.forEach((line, i) => {
				let id = lineToId.get(line);
				if (id === undefined) {
					id = idToLine.length;
					lineToId.set(line, id);
					idToLine.push(line);
				}
				ids[i] = id;
			});
			return ids;
		};

		return { oldIds: intern(oldLines), newIds: intern(newLines), idToLine };
	}

	/**
	 * Emits the shared leading and trailing lines of `range` as EQUAL and
	 * diffs whatever is left between them.
	 */
	private _diffTrimmed(
		lines: InternedLines,
		range: LineRange,
		config: Required<LineDiffOptions>,
		debug: boolean
	): DiffResult[] {
		const { oldIds, newIds, idToLine } = lines;
		const minLen = Math.min(range.oldEnd - range.oldStart, range.newEnd - range.newStart);

		let prefixLen = 0;
		while (prefixLen < minLen && oldIds[range.oldStart + prefixLen] === newIds[range.newStart + prefixLen]) {
			prefixLen++;
		}

		let suffixLen = 0;
		while (
			suffixLen < minLen - prefixLen &&
			oldIds[range.oldEnd - 1 - suffixLen] === newIds[range.newEnd - 1 - suffixLen]
		) {
			suffixLen++;
		}

		if (__DEV__ && debug && (prefixLen > 0 || suffixLen > 0)) {
			console.log(`[_diffTrimmed] prefix=${prefixLen} suffix=${suffixLen}`);
		}

		const inner: LineRange = {
			oldStart: range.oldStart + prefixLen,
			oldEnd: range.oldEnd - suffixLen,
			newStart: range.newStart + prefixLen,
			newEnd: range.newEnd - suffixLen,
		};

		return [
			...this._emit(DiffOperation.EQUAL, oldIds, range.oldStart, inner.oldStart, idToLine),
			...this._diffRange(lines, inner, config, debug),
			...this._emit(DiffOperation.EQUAL, oldIds, inner.oldEnd, range.oldEnd, idToLine),
		];
	}

	private _diffRange(
		lines: InternedLines,
		range: LineRange,
		config: Required<LineDiffOptions>,
		debug: boolean
	): DiffResult[] {
		const oldLen = range.oldEnd - range.oldStart;
		const newLen = range.newEnd - range.newStart;
		if (oldLen < 0 || newLen < 0) {
			throw new Error(`[MyersLineDiff] Invalid range old[${range.oldStart}, ${range.oldEnd}) new[${range.newStart}, ${range.newEnd})`);
		}

		const { oldIds, newIds, idToLine } = lines;
		if (oldLen === 0) return this._emit(DiffOperation.ADD, newIds, range.newStart, range.newEnd, idToLine);
		if (newLen === 0) return this._emit(DiffOperation.REMOVE, oldIds, range.oldStart, range.oldEnd, idToLine);

		if (oldLen + newLen < config.quickDiffThreshold) {
			return this._calculateDiff(lines, range, debug);
		}

		const split = this._findMiddleSnake(lines, range, debug);
		if (split === null) {
			// The two ranges share no line at all.
			return [
				...this._emit(DiffOperation.REMOVE, oldIds, range.oldStart, range.oldEnd, idToLine),
				...this._emit(DiffOperation.ADD, newIds, range.newStart, range.newEnd, idToLine),
			];
		}

		const { x, y } = split;
		if ((x === 0 && y === 0) || (x === oldLen && y === newLen)) {
			// A split at a corner would not shrink the problem.
			return this._calculateDiff(lines, range, debug);
		}

		if (__DEV__ && debug) {
			console.log(`[_diffRange] split at old+${x}, new+${y}`);
		}

		const left: LineRange = {
			oldStart: range.oldStart,
			oldEnd: range.oldStart + x,
			newStart: range.newStart,
			newEnd: range.newStart + y,
		};
		const right: LineRange = {
			oldStart: range.oldStart + x,
			oldEnd: range.oldEnd,
			newStart: range.newStart + y,
			newEnd: range.newEnd,
		};

		return [
			...this._diffTrimmed(lines, left, config, debug),
			...this._diffTrimmed(lines, right, config, debug),
		];
	}

	/**
	 * Runs the forward and backward searches at once until their furthest
	 * reaching paths overlap, and returns that overlap as a split point
	 * relative to the start of `range`.
	 *
	 * @returns The split point, or `null` when the searches never meet.
	 */
	private _findMiddleSnake(
		lines: InternedLines,
		range: LineRange,
		debug: boolean
	): { x: number; y: number } | null {
		const { oldIds, newIds } = lines;
		const oldLen = range.oldEnd - range.oldStart;
		const newLen = range.newEnd - range.newStart;

		const maxD = Math.ceil((oldLen + newLen) / 2);
		const offset = maxD;
		const size = 2 * maxD + 2;
		const forward = new Int32Array(size).fill(-1);
		const backward = new Int32Array(size).fill(-1);
		forward[offset + 1] = 0;
		backward[offset + 1] = 0;

		const delta = oldLen - newLen;
		// With an odd delta the paths can only meet while extending forward.
		const checkForward = delta % 2 !== 0;

		let kForwardStart = 0;
		let kForwardEnd = 0;
		let kBackwardStart = 0;
		let kBackwardEnd = 0;

		for (let d = 0; d < maxD; d++) {
			for (let k = -d + kForwardStart; k <= d - kForwardEnd; k += 2) {
				const kOffset = offset + k;
				let x = (k === -d || (k !== d && forward[kOffset - 1] < forward[kOffset + 1]))
					? forward[kOffset + 1]
					: forward[kOffset - 1] + 1;
				let y = x - k;
				while (x < oldLen && y < newLen && oldIds[range.oldStart + x] === newIds[range.newStart + y]) {
					x++;
					y++;
				}
				forward[kOffset] = x;

				if (x > oldLen) {
					kForwardEnd += 2;
				} else if (y > newLen) {
					kForwardStart += 2;
				} else if (checkForward) {
					const backOffset = offset + delta - k;
					if (backOffset >= 0 && backOffset < size && backward[backOffset] !== -1) {
						if (x >= oldLen - backward[backOffset]) {
							if (__DEV__ && debug) console.log(`[_findMiddleSnake] forward overlap at d=${d}`);
							return { x, y };
						}
					}
				}
			}

			for (let k = -d + kBackwardStart; k <= d - kBackwardEnd; k += 2) {
				const kOffset = offset + k;
				let x = (k === -d || (k !== d && backward[kOffset - 1] < backward[kOffset + 1]))
					? backward[kOffset + 1]
					: backward[kOffset - 1] + 1;
				let y = x - k;
				while (
					x < oldLen &&
					y < newLen &&
					oldIds[range.oldEnd - 1 - x] === newIds[range.newEnd - 1 - y]
				) {
					x++;
					y++;
				}
				backward[kOffset] = x;

				if (x > oldLen) {
					kBackwardEnd += 2;
				} else if (y > newLen) {
					kBackwardStart += 2;
				} else if (!checkForward) {
					const forwardOffset = offset + delta - k;
					if (forwardOffset >= 0 && forwardOffset < size && forward[forwardOffset] !== -1) {
						const forwardX = forward[forwardOffset];
						const forwardY = offset + forwardX - forwardOffset;
						if (forwardX >= oldLen - x) {
							if (__DEV__ && debug) console.log(`[_findMiddleSnake] backward overlap at d=${d}`);
							return { x: forwardX, y: forwardY };
						}
					}
				}
			}
		}

		return null;
	}

	/**
	 * The basic O(ND) Myers algorithm. Keeps a copy of the V buffer for every
	 * `d` and backtracks through them, so it is only used on small ranges.
	 */
	private _calculateDiff(lines: InternedLines, range: LineRange, debug: boolean = false): DiffResult[] {
		const { oldIds, newIds, idToLine } = lines;
		const oldLen = range.oldEnd - range.oldStart;
		const newLen = range.newEnd - range.newStart;

		if (oldLen === 0) return this._emit(DiffOperation.ADD, newIds, range.newStart, range.newEnd, idToLine);
		if (newLen === 0) return this._emit(DiffOperation.REMOVE, oldIds, range.oldStart, range.oldEnd, idToLine);

		const max = oldLen + newLen;
		const offset = max;
		const v = new Int32Array(2 * max + 2);
		const trace: Int32Array[] = [];
		v[offset + 1] = 0;

		for (let d = 0; d <= max; d++) {
			trace.push(v.slice());
			for (let k = -d; k <= d; k += 2) {
				const kOffset = k + offset;
				let x = (k === -d || (k !== d && v[kOffset - 1] < v[kOffset + 1]))
					? v[kOffset + 1] // down: insertion
					: v[kOffset - 1] + 1; // right: deletion
				let y = x - k;
				while (x < oldLen && y < newLen && oldIds[range.oldStart + x] === newIds[range.newStart + y]) {
					x++;
					y++;
				}
				v[kOffset] = x;
				if (x >= oldLen && y >= newLen) {
					if (__DEV__ && debug) console.log(`[_calculateDiff] D=${d} for ${oldLen}x${newLen}`);
					return this._backtrack(trace, lines, range);
				}
			}
		}
		throw new Error(`[MyersLineDiff] No edit path found for ${oldLen}x${newLen}`);
	}

	/** Rebuilds the edit script from the trace left by {@link _calculateDiff}. */
	private _backtrack(trace: Int32Array[], lines: InternedLines, range: LineRange): DiffResult[] {
		const { oldIds, newIds, idToLine } = lines;
		let x = range.oldEnd - range.oldStart;
		let y = range.newEnd - range.newStart;
		const offset = x + y;
		const result: DiffResult[] = [];

		for (let d = trace.length - 1; d >= 0; d--) {
			const v = trace[d];
			const k = x - y;
			const kOffset = k + offset;
			const prevK = (k === -d || (k !== d && v[kOffset - 1] < v[kOffset + 1])) ? k + 1 : k - 1;
			const prevX = v[prevK + offset];
			const prevY = prevX - prevK;

			while (x > prevX && y > prevY) {
				result.push([DiffOperation.EQUAL, idToLine[oldIds[range.oldStart + x - 1]]]);
				x--;
				y--;
			}

			if (d > 0) {
				if (prevX === x) {
					result.push([DiffOperation.ADD, idToLine[newIds[range.newStart + y - 1]]]);
				} else {
					result.push([DiffOperation.REMOVE, idToLine[oldIds[range.oldStart + x - 1]]]);
				}
			}

			x = prevX;
			y = prevY;
			if (x <= 0 && y <= 0) break;
		}

		return result.reverse();
	}

	private _emit(
		operation: DiffOperation,
		ids: Uint32Array,
		start: number,
		end: number,
		idToLine: string[]
	): DiffResult[] {
		const res = new Array<DiffResult>(Math.max(0, end - start));
		for (let i = 0; i < res.length; i++) {
			res[i] = [operation, idToLine[ids[start + i]]];
		}
		return res;
	}
}
