import { suite, test } from 'mocha';
import * as assert from 'assert';
import { diffSegments, compactSegments, shrinkStructs } from '../src/index.js';

const YELLOW = '\u001b[33m';
const RESET = '\u001b[0m';

suite('diffSegments', () => {

	test('isolates the differing middle', () => {
		const result = diffSegments('(atom())', '(binary())', false);
		assert.strictEqual(result.prefix, '(');
		assert.strictEqual(result.expectedDiff, 'atom');
		assert.strictEqual(result.actualDiff, 'binary');
		assert.strictEqual(result.expectedSuffix, '())');
		assert.strictEqual(result.actualSuffix, '())');
		assert.strictEqual(result.expectedLine, '(atom())');
		assert.strictEqual(result.actualLine, '(binary())');
	});

	test('highlights only the differing middle', () => {
		const result = diffSegments('(atom())', '(binary())', true);
		assert.strictEqual(result.expectedLine, `(${YELLOW}atom${RESET}())`);
		assert.strictEqual(result.actualLine, `(${YELLOW}binary${RESET}())`);
	});

	test('identical inputs have empty diffs and no highlight', () => {
		const result = diffSegments('%{a => 1}', '%{a => 1}', true);
		assert.strictEqual(result.prefix, '%{a => 1}');
		assert.strictEqual(result.expectedDiff, '');
		assert.strictEqual(result.actualDiff, '');
		assert.strictEqual(result.expectedLine, '%{a => 1}');
	});

	test('each side reconstructs its input', () => {
		const pairs: [string, string][] = [
			['(atom())', '(binary())'],
			['a(b(1))', 'a(c(2))'],
			[')', 'f()'],
			['ab)', '(ab)'],
			['%{a => 1, inner => %{b => 2, c => 3}}', '%{a => 1, inner => %{b => 5, c => 3}}'],
			['', 'x'],
			['caf\u00e9', 'cafe\u0301']
		];
		for (const [expected, actual] of pairs) {
			const r = diffSegments(expected, actual, false);
			assert.strictEqual(r.prefix + r.expectedDiff + r.expectedSuffix, expected);
			assert.strictEqual(r.prefix + r.actualDiff + r.actualSuffix, actual);
		}
	});

	test('pulls an owed closer back from the suffix', () => {
		const result = diffSegments(')', 'f()', false);
		assert.strictEqual(result.prefix, '');
		assert.strictEqual(result.expectedDiff, '');
		assert.strictEqual(result.expectedSuffix, ')');
		assert.strictEqual(result.actualDiff, 'f()');
		assert.strictEqual(result.actualSuffix, '');
	});

	test('crosses leading whitespace when pulling a closer', () => {
		const result = diffSegments(' )', 'f( )', false);
		assert.strictEqual(result.prefix, '');
		assert.strictEqual(result.actualDiff, 'f( )');
		assert.strictEqual(result.actualSuffix, '');
		assert.strictEqual(result.expectedDiff, '');
		assert.strictEqual(result.expectedSuffix, ' )');
	});

	test('a closer both sides owe is handed back to the suffixes', () => {
		const result = diffSegments('[ ]', '[ [] ]', false);
		assert.strictEqual(result.prefix, '[ ');
		assert.strictEqual(result.expectedDiff, '');
		assert.strictEqual(result.actualDiff, '[] ');
		assert.strictEqual(result.expectedSuffix, ']');
		assert.strictEqual(result.actualSuffix, ']');
	});

	test('does not cross other text when pulling a closer', () => {
		const result = diffSegments('ab)', '(ab)', false);
		assert.strictEqual(result.actualDiff, '(');
		assert.strictEqual(result.actualSuffix, 'ab)');
	});

	test('hands shared trailing closers back to the suffixes', () => {
		const result = diffSegments('a(b(1))', 'a(c(2))', true);
		assert.strictEqual(result.prefix, 'a(');
		assert.strictEqual(result.expectedDiff, 'b(1');
		assert.strictEqual(result.actualDiff, 'c(2');
		assert.strictEqual(result.expectedSuffix, '))');
		assert.strictEqual(result.expectedLine, `a(${YELLOW}b(1${RESET}))`);
	});
});

suite('compactSegments', () => {

	test('compacts a diff inside a nested map field', () => {
		const segments = diffSegments(
			'%{a => 1, inner => %{b => 2, c => 3}}',
			'%{a => 1, inner => %{b => 5, c => 3}}',
			false
		);
		assert.deepStrictEqual(compactSegments(segments), {
			expectedLine: '(%{..., b => 2})',
			actualLine: '(%{..., b => 5})'
		});
	});

	test('compacts a diff inside a named structure field', () => {
		const segments = diffSegments(
			'%User{name => "a", age => 1}',
			'%User{name => "a", age => 2}',
			true
		);
		assert.deepStrictEqual(compactSegments(segments, true), {
			expectedLine: `(%User{..., age => ${YELLOW}1${RESET}})`,
			actualLine: `(%User{..., age => ${YELLOW}2${RESET}})`
		});
	});

	test('compacts values that share their leading characters', () => {
		const segments = diffSegments(
			'%{a => 1, inner => %{b => binary(), c => 3}}',
			'%{a => 1, inner => %{b => bitstring(), c => 3}}',
			false
		);
		assert.deepStrictEqual(compactSegments(segments), {
			expectedLine: '(%{..., b => binary()})',
			actualLine: '(%{..., b => bitstring()})'
		});
	});

	test('highlights the whole value when the diff starts inside it', () => {
		const segments = diffSegments(
			'%User{:name => "a", :age => 10}',
			'%User{:name => "a", :age => 12}',
			true
		);
		assert.deepStrictEqual(compactSegments(segments, true), {
			expectedLine: `(%User{..., :age => ${YELLOW}10${RESET}})`,
			actualLine: `(%User{..., :age => ${YELLOW}12${RESET}})`
		});
	});

	test('takes a nested value up to its own closer', () => {
		const segments = diffSegments('(%S{:a => f(x, 1)})', '(%S{:a => f(x, 2)})', false);
		assert.deepStrictEqual(compactSegments(segments), {
			expectedLine: '(%S{..., :a => f(x, 1)})',
			actualLine: '(%S{..., :a => f(x, 2)})'
		});
	});

	test('names the outermost open structure', () => {
		const segments = diffSegments(
			'%User{meta => %{age => 1}}',
			'%User{meta => %{age => 2}}',
			false
		);
		assert.deepStrictEqual(compactSegments(segments), {
			expectedLine: '(%User{..., age => 1})',
			actualLine: '(%User{..., age => 2})'
		});

		const nested = diffSegments(
			'(%Outer{:inner => %Inner{:foo => atom(), :bar => 1}})',
			'(%Outer{:inner => %Inner{:foo => "title", :bar => 1}})',
			false
		);
		assert.deepStrictEqual(compactSegments(nested), {
			expectedLine: '(%Outer{..., :foo => atom()})',
			actualLine: '(%Outer{..., :foo => "title"})'
		});
	});

	test('does not compact a diff that runs into later entries', () => {
		assert.strictEqual(compactSegments(diffSegments('%{a => 1, b => 2}', '%{a => 3, b => 4}', false)), null);
	});

	test('does not compact outside a map field', () => {
		assert.strictEqual(compactSegments(diffSegments('(atom())', '(binary())', false)), null);
		assert.strictEqual(compactSegments(diffSegments('{%Foo{a => 1}, 1}', '{%Foo{a => 1}, 2}', false)), null);
	});

	test('does not compact a diff in a key', () => {
		assert.strictEqual(compactSegments(diffSegments('%{alpha => 1}', '%{beta => 1}', false)), null);
	});
});

suite('shrinkStructs', () => {

	test('collapses balanced named structures', () => {
		assert.strictEqual(shrinkStructs('(%Foo.Bar{a => %{b => 1}}, 2)'), '(%Foo.Bar{...}, 2)');
	});

	test('keeps structures that overlap the given range', () => {
		const line = '{%Foo{a => 1}, %S{1, 2}}';
		assert.strictEqual(shrinkStructs(line, 21, 22), '{%Foo{...}, %S{1, 2}}');
	});

	test('keeps structures enclosing an empty range', () => {
		assert.strictEqual(shrinkStructs('%S{1, 2}', 4, 4), '%S{1, 2}');
		assert.strictEqual(shrinkStructs('x%S{1, 2}', 1, 1), 'x%S{...}');
	});

	test('leaves maps and unbalanced structures alone', () => {
		assert.strictEqual(shrinkStructs('%{a => 1}'), '%{a => 1}');
		assert.strictEqual(shrinkStructs('%Foo{a => 1'), '%Foo{a => 1');
	});
});
