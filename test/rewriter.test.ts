import { describe, it, expect } from 'vitest';
import { OpCode } from '../src/opcodes';
import { ByteCode, charEntry, compareSimpleWords } from '../src/bytecode';
import { BytecodeRewriter, applyEdits, type Edit } from '../src/rewriter';
import { buildByteCode } from '../src/codegen';
import { parse } from '../src/parse';
import { splitBasicBlocks, splitBlocksForAtomicGroups } from '../src/blocks';
import { OptimizerError } from '../src/errors';

// 0: a, 5: ForkJump -> 14, 7: b, 12: Jump -> 0, 14: c
function sample() {
	const p = new ByteCode();
	p.emitCompare(charEntry(97));
	p.emit(OpCode.ForkJump, 7);
	p.emitCompare(charEntry(98));
	p.emit(OpCode.Jump, -14);
	p.emitCompare(charEntry(99));
	return p;
}

describe('BytecodeRewriter', () => {
	it('relocates jumps across a deletion', () => {
		const out = applyEdits(sample(), [{start: 7, end: 12, replacement: []}]);
		expect(out.words).toEqual([0, 1, 2, 4, 97, 3, 2, 1, -9, 0, 1, 2, 4, 99]);
	});

	it('sends jumps at a deleted instruction to whatever follows it', () => {
		const out = applyEdits(sample(), [{start: 0, end: 5, replacement: []}]);
		expect(out.words).toEqual([3, 7, 0, 1, 2, 4, 98, 1, -9, 0, 1, 2, 4, 99]);
	});

	it('relocates jumps across an insertion', () => {
		const out = applyEdits(sample(), [{start: 7, end: 7, replacement: [OpCode.Save]}]);
		expect(out.words).toEqual([0, 1, 2, 4, 97, 3, 8, 17, 0, 1, 2, 4, 98, 1, -15, 0, 1, 2, 4, 99]);
	});

	it('anchors replacement jumps past their end to the edit end', () => {
		const out = applyEdits(sample(), [{start: 7, end: 12, replacement: [OpCode.Jump, 0]}]);
		expect(out.words).toEqual([0, 1, 2, 4, 97, 3, 4, 1, 0, 1, -11, 0, 1, 2, 4, 99]);
	});

	it('anchors replacement jumps before their start to the edit start', () => {
		// ForkStay -7 inside a 2 word replacement at 12 points back to 7
		const out = applyEdits(sample(), [{start: 12, end: 14, replacement: [OpCode.ForkStay, -7]}]);
		expect(out.decode(12).jump?.target).toBe(7);
		expect(out.decode(5).jump?.target).toBe(14);
	});

	it('rejects edits off instruction boundaries', () => {
		expect(() => applyEdits(sample(), [{start: 1, end: 5, replacement: []}])).toThrow(OptimizerError);
	});

	it('rejects overlapping edits', () => {
		expect(() => applyEdits(sample(), [
			{start: 5, end: 12, replacement: []},
			{start: 7, end: 14, replacement: []},
		])).toThrow(OptimizerError);
	});

	it('rewrites instruction by instruction', () => {
		const p = sample();
		const out = new BytecodeRewriter(p).rewrite(inst => inst.op === OpCode.Compare ? compareSimpleWords(p.compareOperands(inst.ip)[0]) : undefined);
		expect(out.words).toEqual([28, 2, 4, 97, 3, 6, 28, 2, 4, 98, 1, -12, 28, 2, 4, 99]);
	});

	it('returns an equal program when there is nothing to do', () => {
		for (const p of [sample(), buildByteCode(parse('x(?:ab|cd)*y{2,3}z?'))]) {
			const out = applyEdits(p, []);
			expect(out.words).toEqual(p.words);
			for (const ip of p.boundaries())
				expect(out.decode(ip).jump?.target).toBe(p.decode(ip).jump?.target);
		}
	});

	it('relocates every jump of a generated program', () => {
		const p = buildByteCode(parse('x(?:ab|cd)*y{2,3}z?'));
		const edits: Edit[] = [];
		let k = 0;
		for (const inst of p.instructions()) {
			if (inst.op === OpCode.Compare && k % 2 === 0)
				edits.push({start: inst.ip, end: inst.ip + inst.width, replacement: []});
			else if (inst.jump && k % 3 === 0)
				edits.push({start: inst.ip, end: inst.ip, replacement: [OpCode.Save]});
			++k;
		}
		expect(edits.some(e => e.start === e.end)).toBe(true);
		expect(edits.some(e => e.start < e.end)).toBe(true);

		// where an old address lands: the start of the edit that covers it, or shifted by every edit before it
		const moved = (old: number) => {
			let delta = 0;
			for (const e of edits) {
				if (old <= e.start)
					break;
				if (old < e.end)
					return e.start + delta;
				delta += (Array.isArray(e.replacement) ? e.replacement.length : e.replacement.size) - (e.end - e.start);
			}
			return old + delta;
		};

		const out = applyEdits(p, edits);
		for (const inst of p.instructions()) {
			if (!inst.jump)
				continue;
			const inserted = edits.some(e => e.start === inst.ip && e.end === inst.ip);
			const at = moved(inst.ip) + (inserted ? 1 : 0);
			const now = out.decode(at);
			expect(now.op).toBe(inst.op);
			expect(now.jump?.target).toBe(moved(inst.jump.target));
		}
	});

	it('leaves the input untouched', () => {
		const p = sample();
		const before = [...p.words];
		applyEdits(p, [{start: 7, end: 12, replacement: []}]);
		expect(p.words).toEqual(before);
	});
});

describe('basic blocks', () => {
	it('splits at targets and fall-throughs', () => {
		expect(splitBasicBlocks(sample())).toEqual([
			{start: 0, end: 5},
			{start: 7, end: 12},
			{start: 14, end: 14},
		]);
	});

	it('rejects jumps into the middle of an instruction', () => {
		const p = new ByteCode([OpCode.Jump, 1]).emitCompare(charEntry(97));
		expect(() => splitBasicBlocks(p)).toThrow(OptimizerError);
	});

	it('has no blocks for an empty program', () => {
		expect(splitBasicBlocks(new ByteCode())).toEqual([]);
		expect(splitBlocksForAtomicGroups(new ByteCode())).toEqual([]);
	});

	it('cuts after FailForks', () => {
		const p = new ByteCode([OpCode.FailForks]).emitCompare(charEntry(97));
		expect(splitBasicBlocks(p)).toEqual([{start: 0, end: 0}, {start: 1, end: 1}]);
	});

	it('builds loop-shaped blocks for the atomic rewrite', () => {
		expect(splitBlocksForAtomicGroups(sample())).toEqual([
			{start: 0, end: 5, comment: 'Jump ahead'},
			{start: 7, end: 12, comment: 'Jump'},
			{start: 14, end: 19, comment: 'End'},
		]);
	});

	it('splits a span that a backward jump enters', () => {
		// a, b, Jump -> b
		const p = new ByteCode().emitCompare(charEntry(97)).emitCompare(charEntry(98)).emit(OpCode.Jump, -7);
		expect(splitBlocksForAtomicGroups(p)).toEqual([
			{start: 0, end: 5, comment: 'Jump back 1'},
			{start: 5, end: 10, comment: 'Jump back 2'},
		]);
	});
});
