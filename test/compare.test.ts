import { describe, it, expect } from 'vitest';
import { CompareType, CharClass } from '../src/opcodes';
import { StringTable, entry, charEntry, rangeEntry } from '../src/bytecode';
import { interpretCompares, hasOverlap, overlapsSet } from '../src/compare';
import { OptimizerError } from '../src/errors';
import { codes } from '../src/types';

const ranges = (list: {inclusiveRanges(): [number, number][]}[] | undefined) => list?.map(r => r.inclusiveRanges());

describe('interpretCompares', () => {
	const strings = new StringTable();

	it('files operands under a temporary inverse as negated', () => {
		const interp = interpretCompares([charEntry(97), entry(CompareType.TemporaryInverse), charEntry(98), rangeEntry(48, 57)], strings);
		expect(interp?.inverse).toBe(false);
		expect(ranges(interp?.ranges)).toEqual([[[97, 97]], [[48, 57]]]);
		expect(ranges(interp?.negatedRanges)).toEqual([[[98, 98]]]);
	});

	it('flips the buckets under a leading inverse', () => {
		const interp = interpretCompares([
			entry(CompareType.Inverse),
			charEntry(97),
			entry(CompareType.TemporaryInverse),
			entry(CompareType.CharClass, CharClass.Digit),
		], strings);
		expect(interp?.inverse).toBe(true);
		expect(ranges(interp?.negatedRanges)).toEqual([[[97, 97]]]);
		expect(interp?.classes).toEqual([CharClass.Digit]);
		expect(interp?.negatedClasses).toEqual([]);
	});

	it('records properties and references', () => {
		const lu = strings.intern('Lu');
		expect(interpretCompares([entry(CompareType.GeneralCategory, lu)], strings)?.properties).toEqual([{kind: 'gc', name: 'Lu'}]);
		expect(interpretCompares([entry(CompareType.Reference, 1)], strings)?.hasReference).toBe(true);
	});

	it('reads an Or group as a union', () => {
		const interp = interpretCompares([entry(CompareType.Or), charEntry(97), charEntry(98), entry(CompareType.EndAndOr)], strings);
		expect(ranges(interp?.ranges)).toEqual([[[97, 97]], [[98, 98]]]);
	});

	it('gives up on what it cannot model', () => {
		const ab	= strings.intern('ab');
		const x		= strings.intern('x');
		const set	= strings.internSet(['a', 'b']);
		expect(interpretCompares([entry(CompareType.AnyChar)], strings)).toBeUndefined();
		expect(interpretCompares([entry(CompareType.String, ab)], strings, true)).toBeUndefined();
		expect(interpretCompares([entry(CompareType.String, x)], strings)).toBeUndefined();
		expect(interpretCompares([entry(CompareType.StringSet, set)], strings)).toBeUndefined();
		expect(interpretCompares([entry(CompareType.And), charEntry(97), entry(CompareType.EndAndOr)], strings)).toBeUndefined();
		expect(interpretCompares([entry(CompareType.Subtract), charEntry(97), entry(CompareType.EndAndOr)], strings)).toBeUndefined();
		expect(interpretCompares([charEntry(97), entry(CompareType.Inverse)], strings)).toBeUndefined();
	});

	it('accepts single code point strings when asked', () => {
		const x		= strings.intern('x');
		const set	= strings.internSet(['a', 'b']);
		expect(ranges(interpretCompares([entry(CompareType.String, x)], strings, true)?.ranges)).toEqual([[[120, 120]]]);
		expect(ranges(interpretCompares([entry(CompareType.StringSet, set)], strings, true)?.ranges)).toEqual([[[97, 98]]]);
	});

	it('throws on an unopened EndAndOr', () => {
		expect(() => interpretCompares([entry(CompareType.EndAndOr)], strings)).toThrow(OptimizerError);
	});
});

describe('hasOverlap', () => {
	const strings = new StringTable();
	const lu = strings.intern('Lu');

	it('compares characters and ranges', () => {
		expect(hasOverlap([charEntry(97)], [charEntry(98)], strings)).toBe(false);
		expect(hasOverlap([rangeEntry(97, 122)], [charEntry(109)], strings)).toBe(true);
	});

	it('closes over case when case is ignored', () => {
		expect(hasOverlap([charEntry(97)], [charEntry(65)], strings)).toBe(false);
		expect(hasOverlap([charEntry(97)], [charEntry(65)], strings, {i: true})).toBe(true);
	});

	it('sees through classes and inversion', () => {
		expect(hasOverlap([entry(CompareType.CharClass, CharClass.Digit)], [charEntry(53)], strings)).toBe(true);
		expect(hasOverlap([entry(CompareType.CharClass, CharClass.Digit)], [charEntry(97)], strings)).toBe(false);
		expect(hasOverlap([entry(CompareType.Inverse), charEntry(97)], [charEntry(97)], strings)).toBe(false);
		expect(hasOverlap([entry(CompareType.Inverse), charEntry(97)], [charEntry(98)], strings)).toBe(true);
	});

	it('tests properties one code point at a time', () => {
		expect(hasOverlap([entry(CompareType.GeneralCategory, lu)], [charEntry(97)], strings)).toBe(false);
		expect(hasOverlap([entry(CompareType.GeneralCategory, lu)], [charEntry(65)], strings)).toBe(true);
	});

	it('assumes an overlap when it cannot tell', () => {
		expect(hasOverlap([entry(CompareType.AnyChar)], [charEntry(97)], strings)).toBe(true);
		expect(hasOverlap([entry(CompareType.Reference, 1)], [charEntry(97)], strings)).toBe(true);
	});
});

describe('overlapsSet', () => {
	const strings = new StringTable();

	it('checks a compare against a set of code points', () => {
		expect(overlapsSet([charEntry(97)], strings, codes(10))).toBe(false);
		expect(overlapsSet([entry(CompareType.Inverse), charEntry(97)], strings, codes(10))).toBe(true);
	});

	it('closes over case when case is ignored', () => {
		expect(overlapsSet([charEntry(65)], strings, codes(97))).toBe(false);
		expect(overlapsSet([charEntry(65)], strings, codes(97), {i: true})).toBe(true);
	});
});
