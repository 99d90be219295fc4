import { describe, it, expect } from 'vitest';
import { parse, toRegExpString } from '../src/parse';
import { ParseError } from '../src/errors';
import { CharClass } from '../src/opcodes';

describe('parse', () => {
	it('keeps plain text as a string', () => {
		expect(parse('abc')).toBe('abc');
	});

	it('builds alternations', () => {
		expect(parse('a|b')).toEqual({type: 'alt', parts: ['a', 'b']});
	});

	it('quantifies only the last character of text', () => {
		expect(parse('ab*')).toEqual(['a', {type: 'quantified', part: 'b', min: 0, max: -1, mod: 'greedy'}]);
		expect(parse('x{2,3}?')).toEqual({type: 'quantified', part: 'x', min: 2, max: 3, mod: 'lazy'});
	});

	it('reads named groups and class escapes', () => {
		expect(parse('(?<year>\\d{4})')).toEqual({
			type: 'capture',
			name: 'year',
			part: {
				type: 'quantified',
				part: {type: 'set', items: [{type: 'builtin', name: CharClass.Digit}]},
				min: 4,
				max: 4,
				mod: 'greedy',
			},
		});
	});

	it('reads bracketed classes', () => {
		expect(parse('[^a-c\\d]')).toEqual({
			type: 'set',
			items: [[97, 99], {type: 'builtin', name: CharClass.Digit}],
			negated: true,
		});
		expect(parse('[-a]')).toEqual({type: 'set', items: [45, 97], negated: false});
	});

	it('reads property escapes', () => {
		expect(parse('\\p{Lu}')).toEqual({
			type: 'set',
			items: [{type: 'property', kind: 'gc', name: 'Lu', negated: false}],
		});
		expect(parse('\\P{sc=Greek}')).toEqual({
			type: 'set',
			items: [{type: 'property', kind: 'script', name: 'Greek', negated: true}],
		});
	});

	it('reads character escapes', () => {
		expect(parse('\\x41\\u0042\\u{43}\\n\\.')).toBe('ABC\n.');
	});

	it('reads backreferences', () => {
		expect(parse('(a)\\1')).toEqual([{type: 'capture', part: 'a'}, {type: 'reference', value: 1}]);
		expect(parse('\\k<n>')).toEqual({type: 'reference', value: 'n'});
	});

	it('reports malformed patterns', () => {
		for (const pattern of ['(a', 'a)', '[a', '*a', 'a{3,1}', 'a{2', '\\p{Bogus}', '(?i:a)', '(?<1>a)', '^*', '(?=a)+', '[z-a]'])
			expect(() => parse(pattern), pattern).toThrow(ParseError);
	});

	it('says where a pattern went wrong', () => {
		try {
			parse('ab)');
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(ParseError);
			if (e instanceof ParseError) {
				expect(e.offset).toBe(2);
				expect(e.message).toBe('unmatched ) at 2 in /ab)/');
			}
		}
	});
});

describe('toRegExpString', () => {
	it('prints what it parsed', () => {
		for (const pattern of ['a(b|c)*d', '[^a-c\\d]x', '(?<=a)b', '\\bfoo\\B', 'x{2,3}?', '(?:ab)+', '(?<n>a)\\k<n>', '\\p{gc=Lu}+', '^a.$'])
			expect(toRegExpString(parse(pattern))).toBe(pattern);
	});

	it('escapes special characters', () => {
		expect(toRegExpString(parse('\\$\\(x'))).toBe('\\$\\(x');
		expect(toRegExpString(parse('[\\-a]'))).toBe('[\\-a]');
	});
});
