import { describe, it, expect } from 'vitest';
import { OpCode } from '../src/opcodes';
import { ByteCode, charEntry } from '../src/bytecode';
import { compileAlternation, emitChain } from '../src/alternation';
import { dropUselessJumps } from '../src/passes';
import { execute } from '../src/vm';

function literals(program: ByteCode, ...alternatives: string[]) {
	return alternatives.map(s => {
		const f = program.fragment();
		for (const c of s)
			f.emitCompare(charEntry(c.charCodeAt(0)));
		return f;
	});
}

describe('alternation', () => {
	it('chains branches with nothing in common', () => {
		const p = new ByteCode();
		compileAlternation(p, literals(p, 'a', 'b'));
		expect(p.words).toEqual([3, 7, 0, 1, 2, 4, 98, 1, 7, 0, 1, 2, 4, 97, 1, 0]);
	});

	it('guards branches that start at a line start', () => {
		const p = new ByteCode();
		const [a, b] = literals(p, 'a', 'b');
		emitChain(p, [p.fragment([OpCode.CheckBegin]).append(a), b]);
		expect(p.words).toEqual([7, 7, 3, 0, 0, 1, 2, 4, 98, 1, 8, 14, 0, 1, 2, 4, 97, 1, 0]);
	});

	it('shares a long common prefix', () => {
		const p = new ByteCode();
		compileAlternation(p, literals(p, 'abcx', 'abcy'));
		expect(p.words).toEqual([
			1, 0,
			0, 1, 2, 4, 97, 1, 0,
			0, 1, 2, 4, 98, 1, 0,
			0, 1, 2, 4, 99, 3, 11, 1, 0,
			0, 1, 2, 4, 121, 1, 0,
			1, 9,
			0, 1, 2, 4, 120, 1, 0,
			1, 0,
		]);
		expect(dropUselessJumps(p, {flags: {}, log: () => {}}).words).toEqual([
			0, 1, 2, 4, 97,
			0, 1, 2, 4, 98,
			0, 1, 2, 4, 99,
			3, 7,
			0, 1, 2, 4, 121,
			1, 5,
			0, 1, 2, 4, 120,
		]);
	});

	it('keeps a chain when sharing would cost more', () => {
		const p = new ByteCode();
		compileAlternation(p, literals(p, 'ab', 'ac'));
		expect(p.size).toBe(26);
		expect(p.words[0]).toBe(OpCode.ForkJump);
	});

	it('tries branches in order', () => {
		for (const [alternatives, text, end] of [
			[['abcx', 'abcy'], 'abcy', 4],
			[['ab', 'a'], 'ab', 2],
			[['a', 'ab'], 'ab', 1],
		] as const) {
			const p = new ByteCode();
			compileAlternation(p, literals(p, ...alternatives));
			expect(execute(p, text)?.end).toBe(end);
		}
	});

	it('handles degenerate lists', () => {
		const p = new ByteCode();
		compileAlternation(p, []);
		compileAlternation(p, literals(p, '', ''));
		expect(p.size).toBe(0);
		compileAlternation(p, literals(p, 'a'));
		expect(p.words).toEqual([0, 1, 2, 4, 97]);
	});
});
