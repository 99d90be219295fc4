import { describe, it, expect } from 'vitest';
import { OpCode } from '../src/opcodes';
import { ByteCode, charEntry } from '../src/bytecode';
import { dropUselessJumps, type PassContext } from '../src/passes';
import { optimize, type OptimizerOptions } from '../src/optimizer';
import { buildByteCode } from '../src/codegen';
import { parse } from '../src/parse';
import { execute } from '../src/vm';
import type { options } from '../src/types';

const ctx: PassContext = {flags: {}, log: () => {}};

function compile(pattern: string, flags: options = {}) {
	return buildByteCode(parse(pattern), {flags});
}

function optimized(pattern: string, opts: OptimizerOptions = {}) {
	return optimize(compile(pattern, opts.flags), opts);
}

describe('dropping zero-offset jumps', () => {
	it('removes jumps and forks to the next instruction', () => {
		const p = new ByteCode([OpCode.Jump, 0, OpCode.ForkStay, 0]).emitCompare(charEntry(97));
		expect(dropUselessJumps(p, ctx).words).toEqual([0, 1, 2, 4, 97]);
	});

	it('keeps going while removals expose new ones', () => {
		const p = new ByteCode([OpCode.Jump, 2, OpCode.Jump, 0]).emitCompare(charEntry(97));
		const log: string[] = [];
		const out = dropUselessJumps(p, {flags: {}, log: m => log.push(m)});
		expect(out.words).toEqual([0, 1, 2, 4, 97]);
		expect(log).toEqual(['dropped 1 zero-offset jumps', 'dropped 1 zero-offset jumps']);
	});

	it('is idempotent', () => {
		const once = dropUselessJumps(compile('a|b|cd*'), ctx);
		expect(dropUselessJumps(once, ctx).words).toEqual(once.words);
	});
});

describe('substring search', () => {
	it('recognises a plain literal', () => {
		const input = compile('abc');
		const result = optimize(input);
		expect(result.data).toEqual({
			anchoredToLineStart:		false,
			startingRanges:				[[97, 97]],
			startingRangesInsensitive:	[[97, 97]],
			substring:					[97, 98, 99],
		});
		expect(result.program.words).toEqual(input.words);
	});

	it('gives code units for characters outside the BMP', () => {
		expect(optimized('\\u{1F600}').data.substring).toEqual([0xd83d, 0xde00]);
	});

	it('treats the empty pattern as the empty substring', () => {
		expect(optimized('').data).toEqual({
			anchoredToLineStart:		false,
			startingRanges:				[],
			startingRangesInsensitive:	[],
			substring:					[],
		});
	});

	it('does not apply to anything but single characters', () => {
		expect(optimized('a.c').data.substring).toBeUndefined();
		expect(optimized('ab*').data.substring).toBeUndefined();
		expect(optimized('^ab').data.substring).toBeUndefined();
	});

	it('does not apply when case is ignored', () => {
		expect(optimized('abc', {flags: {i: true}}).data.substring).toBeUndefined();
	});

	it('can be switched off', () => {
		expect(optimized('abc', {passes: {substringSearch: false}}).data.substring).toBeUndefined();
	});
});

describe('atomic loops', () => {
	it('upgrades a star whose exit cannot start like its body', () => {
		const {program} = optimized('a*b', {passes: {mergeCompares: false, seekDotStar: false, simpleCompares: false}});
		expect(program.words).toEqual([6, 11, 27, 0, 0, 1, 2, 4, 97, 2, -13, 0, 1, 0, 1, 2, 4, 98]);
	});

	it('upgrades the closing fork of a plus', () => {
		const {program} = optimized('a+b', {passes: {mergeCompares: false, seekDotStar: false, simpleCompares: false}});
		expect(program.words).toEqual([27, 0, 0, 1, 2, 4, 97, 2, -11, 0, OpCode.ForkReplaceJump, 0, 1, 2, 4, 98]);
	});

	it('leaves loops alone when the exit overlaps the body', () => {
		expect(optimized('a*a').program.words[0]).toBe(OpCode.ForkStay);
		expect(optimized('[a-z]*x').program.words[0]).toBe(OpCode.ForkStay);
		expect(optimized('a*b', {flags: {i: true}}).program.words[0]).toBe(OpCode.ForkReplaceStay);
		expect(optimized('a*A', {flags: {i: true}}).program.words[0]).toBe(OpCode.ForkStay);
	});

	it('matches like the unrewritten program when the exit overlaps the body', () => {
		const input = compile('a*a');
		const {program} = optimize(input);
		for (const [text, span] of [['aaab', [0, 3]], ['aaa', [0, 3]], ['', undefined]] as const) {
			const result = execute(program, text);
			expect(result && [result.index, result.end], text).toEqual(span);
			expect(result, text).toEqual(execute(input, text));
		}
	});

	it('leaves loops with forks inside alone', () => {
		expect(optimized('(?:ab?)*c').program.words[0]).toBe(OpCode.ForkStay);
	});

	it('treats the end of the program as a disjoint exit', () => {
		// x shortens to four words, which moves the fork to 4
		expect(optimized('xa*').program.words[4]).toBe(OpCode.ForkReplaceStay);
	});
});

describe('merging compares', () => {
	it('turns a run of characters into one string', () => {
		const {program} = optimized('^abc', {passes: {simpleCompares: false}});
		expect(program.words).toEqual([14, 0, 1, 2, 5, 0]);
		expect(program.strings.string(0)).toBe('abc');
	});

	it('stops a run at a block boundary', () => {
		const {program} = optimized('^ab*c', {passes: {atomicLoops: false, simpleCompares: false}});
		expect(program.words.slice(0, 6)).toEqual([14, 0, 1, 2, 4, 97]);
	});
});

describe('seeking for .*', () => {
	it('replaces .* before a single character', () => {
		expect(optimized('.*x').program.words).toEqual([13, 120, 4, -4, 28, 2, 4, 120]);
	});

	it('is skipped when case is ignored', () => {
		expect(optimized('.*x', {flags: {i: true}}).program.words[0]).toBe(OpCode.ForkStay);
	});

	it('needs a single character after the loop', () => {
		expect(optimized('.*[xy]').program.words[0]).toBe(OpCode.ForkStay);
		expect(optimized('.*').program.words[0]).toBe(OpCode.ForkStay);
	});
});

describe('simple compares', () => {
	it('shortens single-range compares only', () => {
		expect(optimized('[ab]').program.words[0]).toBe(OpCode.CompareSimple);
		expect(optimized('[ac]').program.words[0]).toBe(OpCode.Compare);
		expect(optimized('[^a]').program.words[0]).toBe(OpCode.Compare);
	});

	it('produces the final a*b program', () => {
		expect(optimized('a*b').program.words).toEqual([6, 10, 27, 0, 28, 2, 4, 97, 2, -12, 0, 1, 28, 2, 4, 98]);
	});
});

describe('optimizer driver', () => {
	it('logs what each pass did', () => {
		const log: string[] = [];
		optimized('a*b', {log: m => log.push(m)});
		expect(log).toEqual(['loop closed at 0 made atomic', '2 compares shortened']);
	});

	it('does not change its input', () => {
		const input = compile('a*b');
		const before = [...input.words];
		optimize(input);
		expect(input.words).toEqual(before);
	});

	it('leaves the input string table alone', () => {
		const input = compile('^abc');
		const {program} = optimize(input);
		expect(input.strings.strings).toEqual([]);
		expect(program.strings.strings).toEqual(['abc']);
	});

	it('runs nothing that is switched off', () => {
		const input = compile('a*b');
		const {program} = optimize(input, {passes: {
			dropUselessJumps: false, substringSearch: false, atomicLoops: false,
			mergeCompares: false, seekDotStar: false, simpleCompares: false,
		}});
		expect(program.words).toEqual(input.words);
	});
});

describe('optimization data', () => {
	it('notes a leading line anchor', () => {
		expect(optimized('^abc').data).toEqual({anchoredToLineStart: true, startingRanges: [], startingRangesInsensitive: []});
	});

	it('keeps collecting ranges past a leading line anchor', () => {
		expect(optimized('^[a-c]x').data).toEqual({anchoredToLineStart: true, startingRanges: [[97, 99]], startingRangesInsensitive: [[97, 99]]});
	});

	it('collects the ranges a match can start with', () => {
		expect(optimized('[a-c]x').data).toEqual({anchoredToLineStart: false, startingRanges: [[97, 99]], startingRangesInsensitive: [[97, 99]]});
		expect(optimized('[A-C]d').data).toEqual({anchoredToLineStart: false, startingRanges: [[65, 67]], startingRangesInsensitive: [[97, 99]]});
	});

	it('has no ranges when the first block starts with a loop', () => {
		expect(optimized('a*b').data).toEqual({anchoredToLineStart: false, startingRanges: [], startingRangesInsensitive: []});
		expect(optimized('.*x').data).toEqual({anchoredToLineStart: false, startingRanges: [], startingRangesInsensitive: []});
	});
});
