import { suite, test } from 'mocha';
import * as assert from 'assert';
import {
	MyersLineDiff,
	DiffOperation,
	type DiffResult,
	type LineDiffOptions
} from '../src/index.js';

suite('MyersLineDiff (exact match)', () => {

	const runMyersTest = (
		title: string,
		oldLines: string[],
		newLines: string[],
		expected: DiffResult[],
		options?: LineDiffOptions
	) => {
		test(title, () => {
			const myers = new MyersLineDiff();
			assert.deepStrictEqual(myers.diff(oldLines, newLines, false, options), expected);
		});
	};

	runMyersTest(
		'should handle simple addition',
		['line 1', 'line 3'],
		['line 1', 'line 2', 'line 3'],
		[
			[DiffOperation.EQUAL, 'line 1'],
			[DiffOperation.ADD, 'line 2'],
			[DiffOperation.EQUAL, 'line 3']
		]
	);

	runMyersTest(
		'should handle simple deletion',
		['line 1', 'line 2', 'line 3'],
		['line 1', 'line 3'],
		[
			[DiffOperation.EQUAL, 'line 1'],
			[DiffOperation.REMOVE, 'line 2'],
			[DiffOperation.EQUAL, 'line 3']
		]
	);

	runMyersTest(
		'should handle simple replacement',
		['line 1', 'old', 'line 3'],
		['line 1', 'new', 'line 3'],
		[
			[DiffOperation.EQUAL, 'line 1'],
			[DiffOperation.REMOVE, 'old'],
			[DiffOperation.ADD, 'new'],
			[DiffOperation.EQUAL, 'line 3']
		]
	);

	runMyersTest(
		'should handle replacement through the middle snake',
		['line 1', 'old', 'line 3'],
		['line 1', 'new', 'line 3'],
		[
			[DiffOperation.EQUAL, 'line 1'],
			[DiffOperation.REMOVE, 'old'],
			[DiffOperation.ADD, 'new'],
			[DiffOperation.EQUAL, 'line 3']
		],
		{ quickDiffThreshold: 0 }
	);

	runMyersTest(
		'should handle move (complex change)',
		['a', 'b', 'c'],
		['b', 'c', 'a'],
		[
			[DiffOperation.REMOVE, 'a'],
			[DiffOperation.EQUAL, 'b'],
			[DiffOperation.EQUAL, 'c'],
			[DiffOperation.ADD, 'a']
		]
	);

	runMyersTest(
		'should handle changes involving only whitespace',
		Array.from('a b c'),
		Array.from('a\tb\tc'),
		[
			[DiffOperation.EQUAL, 'a'],
			[DiffOperation.REMOVE, ' '],
			[DiffOperation.ADD, '\t'],
			[DiffOperation.EQUAL, 'b'],
			[DiffOperation.REMOVE, ' '],
			[DiffOperation.ADD, '\t'],
			[DiffOperation.EQUAL, 'c']
		]
	);

	runMyersTest(
		'should handle complete rewrite',
		['%{a => 1}', '%{b => 2}'],
		['(atom())', '[x]'],
		[
			[DiffOperation.REMOVE, '%{a => 1}'],
			[DiffOperation.REMOVE, '%{b => 2}'],
			[DiffOperation.ADD, '(atom())'],
			[DiffOperation.ADD, '[x]']
		]
	);

	runMyersTest(
		'should handle deletion of all content',
		['line 1', 'line 2'],
		[],
		[
			[DiffOperation.REMOVE, 'line 1'],
			[DiffOperation.REMOVE, 'line 2']
		]
	);

	runMyersTest(
		'should handle creation from empty',
		[],
		['line 1', 'line 2'],
		[
			[DiffOperation.ADD, 'line 1'],
			[DiffOperation.ADD, 'line 2']
		]
	);

	runMyersTest(
		'should handle identical input',
		['x', 'y'],
		['x', 'y'],
		[
			[DiffOperation.EQUAL, 'x'],
			[DiffOperation.EQUAL, 'y']
		]
	);

	runMyersTest(
		'should handle two empty inputs',
		[],
		[],
		[]
	);
});

suite('MyersLineDiff (replay)', () => {

	// Deterministic line generator: a small alphabet keeps plenty of repeats.
	const generateLines = (seed: number, count: number): string[] => {
		let state = seed;
		const lines: string[] = [];
		for (let i = 0; i < count; i++) {
			state = (state * 48271) % 2147483647;
			lines.push(`%{k => ${state % 7}}`);
		}
		return lines;
	};

	const replay = (result: DiffResult[], keep: DiffOperation): string[] =>
		result.filter(([op]) => op === DiffOperation.EQUAL || op === keep).map(([, line]) => line);

	const runReplayTest = (title: string, oldLines: string[], newLines: string[], options?: LineDiffOptions) => {
		test(title, () => {
			const result = new MyersLineDiff().diff(oldLines, newLines, false, options);
			assert.deepStrictEqual(replay(result, DiffOperation.REMOVE), oldLines);
			assert.deepStrictEqual(replay(result, DiffOperation.ADD), newLines);
		});
	};

	runReplayTest('replays small inputs', generateLines(1, 12), generateLines(2, 9));
	runReplayTest('replays inputs above the quick threshold', generateLines(3, 120), generateLines(4, 140));
	runReplayTest('replays when every range is bisected', generateLines(5, 40), generateLines(6, 33), { quickDiffThreshold: 0 });
	runReplayTest('replays without trimming', generateLines(7, 30), generateLines(7, 31), { skipTrimming: true, quickDiffThreshold: 0 });
	runReplayTest('replays inputs with nothing in common', generateLines(8, 50).map(l => `a ${l}`), generateLines(9, 50).map(l => `b ${l}`));
});
