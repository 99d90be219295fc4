import { describe, it, expect } from 'vitest';
import { Regex } from '../src/regex';
import { execute } from '../src/vm';
import type { options } from '../src/types';

// deterministic stream of numbers in [0, 1)
function mulberry32(seed: number) {
	return () => {
		seed = (seed + 0x6d2b79f5) | 0;
		let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
		t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

const atoms		= ['a', 'b', 'A', '.', '[ab]', '[^a]', '(a|b)', '(?:ab|a)', '(a)', '\\w'];
const anchors	= ['^', '$', '\\b', '\\B'];
const suffixes	= ['', '', '', '*', '+', '?', '{2}', '{1,2}', '*?', '+?'];
const alphabet	= 'aAb\n ';

function pattern(random: () => number) {
	const pick = <T>(list: readonly T[]) => list[Math.floor(random() * list.length)];
	const count = 1 + Math.floor(random() * 4);
	let s = '';
	for (let k = 0; k < count; k++)
		s += random() < 0.15 ? pick(anchors) : pick(atoms) + pick(suffixes);
	return s;
}

function input(random: () => number) {
	const length = Math.floor(random() * 7);
	let s = '';
	for (let k = 0; k < length; k++)
		s += alphabet[Math.floor(random() * alphabet.length)];
	return s;
}

function flags(random: () => number): options {
	return {i: random() < 0.3, m: random() < 0.3, s: random() < 0.3};
}

describe('optimized against unoptimized', () => {
	it('finds the same matches on generated patterns', () => {
		const random = mulberry32(12345);
		for (let n = 0; n < 300; n++) {
			const source	= pattern(random);
			const opts		= flags(random);
			const re		= Regex.fromString(source, opts);
			for (let k = 0; k < 8; k++) {
				const text = input(random);
				expect(re.exec(text), `/${source}/ ${JSON.stringify(opts)} on ${JSON.stringify(text)}`)
					.toEqual(execute(re.unoptimized, text, 0, {flags: re.flags}));
			}
		}
	});

	it('agrees on the seek rewrite', () => {
		const re = Regex.fromString('(.*)b.*a');
		for (const text of ['', 'ba', 'abab', 'bba\nba', 'a\nb\na', 'bab ab'])
			expect(re.exec(text), text).toEqual(execute(re.unoptimized, text, 0));
	});
});
