/* eslint-disable no-control-regex, no-misleading-character-class */
import { bits } from "@isopodlabs/utilities";
import { CharClass } from "./opcodes";
import type { PropertyKind } from "./unicode";

export interface options {
	i?: boolean;	// ignoreCase
	m?: boolean;	// multiLine
	s?: boolean;	// dotAll
};

const namedControls: Record<number, string> = {
	0:	'0',
	8:	'b',
	9:	't',
	10:	'n',
	11:	'v',
	12:	'f',
	13:	'r',
};

const invisibleChars = /[\u0000-\u001F\u007F-\u009F\u00A0\u1680\u2000-\u200F\u2028-\u202F\u205F-\u2064\u2066-\u206F\u3000\uFE00-\uFE0F\uFEFF]/g;

function controlCode(i: number): string {
	return '\\' + (i > 32
		? 'u' + i.toString(16).padStart(4, '0')
		: (namedControls[i] ?? 'c' + String.fromCharCode(i + 64))
	);
}

export function escapeText(s: string): string {
	return s.replace(/[\\^$*+?.()|[\]{}]/g, '\\$&')
			.replace(invisibleChars, c => controlCode(c.charCodeAt(0)));
}

//-----------------------------------------------------------------------------
//	Code point sets
//-----------------------------------------------------------------------------

export class characterClass extends bits.SparseBits2 {
	isNegated(): boolean {
		return !!this.undef;
	}

	testChar(c: string): boolean {
		const code = c.codePointAt(0);
		return code !== undefined && this.test(code);
	}

	// inclusive [from, to] pairs of a finite set
	inclusiveRanges(): [number, number][] {
		const result: [number, number][] = [];
		for (const [from, to] of this.ranges(true))
			result.push([from, to - 1]);
		return result;
	}

	size(): number {
		let n = 0;
		for (const [from, to] of this.ranges(true))
			n += to - from;
		return n;
	}

	*codes(): Generator<number> {
		for (const [from, to] of this.ranges(true)) {
			for (let c = from; c < to; c++)
				yield c;
		}
	}

	toString(): string {
		const neg = this.isNegated();
		let s = neg ? '^' : '';
		for (const range of this.ranges(!neg)) {
			const [c1, c2] = range;
			s += escapeText(String.fromCodePoint(c1));
			if (c1 !== c2 - 1)
				s += '-' + escapeText(String.fromCodePoint(c2 - 1));
		}
		return s;
	}
};

export function empty() {
	return new characterClass();
}

export function anySet() {
	return new characterClass([], true);
}

// inclusive bounds
export function codeRange(from: number, to: number) {
	const c = new characterClass();
	c.setRange(from, to + 1);
	return c;
}

export function codes(...list: number[]) {
	const c = new characterClass();
	for (const i of list)
		c.set(i);
	return c;
}

export function fromRanges(list: Iterable<readonly [number, number]>) {
	const c = new characterClass();
	for (const [from, to] of list)
		c.setRange(from, to + 1);
	return c;
}

export function range(from: string, to: string) {
	return codeRange(from.charCodeAt(0), to.charCodeAt(0));
}

export function chars(chars: string) {
	const c = new characterClass();
	for (let i = 0; i < chars.length; i++)
		c.set(chars.charCodeAt(i));
	return c;
}

export function union(...classes: characterClass[]) {
	return classes.reduce((result, c) => result.selfUnion(c), new characterClass());
}

// Common character class constants and ranges
export const eol		: characterClass = chars('\n\r\u2028\u2029');
export const digit		: characterClass = range('0', '9');
export const lower		: characterClass = range('a', 'z');
export const upper		: characterClass = range('A', 'Z');
export const alpha		: characterClass = union(lower, upper);
export const alnum		: characterClass = union(alpha, digit);
export const word		: characterClass = union(alnum, chars('_'));
export const whitespace	: characterClass = union(
	codeRange(0x09, 0x0d), codes(0x20, 0xa0, 0x1680), codeRange(0x2000, 0x200a),
	codes(0x2028, 0x2029, 0x202f, 0x205f, 0x3000, 0xfeff)
);
export const hex		: characterClass = union(digit, chars('abcdefABCDEF'));
export const cntrl		: characterClass = union(codeRange(0, 0x1f), codes(0x7f));
export const graph		: characterClass = codeRange(0x21, 0x7e);
export const print		: characterClass = codeRange(0x20, 0x7e);
export const punct		: characterClass = union(codeRange(0x21, 0x2f), codeRange(0x3a, 0x40), codeRange(0x5b, 0x60), codeRange(0x7b, 0x7e));
export const blank		: characterClass = chars(' \t');

export const charClassSets: Record<CharClass, characterClass> = {
	[CharClass.Alnum]:	alnum,
	[CharClass.Cntrl]:	cntrl,
	[CharClass.Lower]:	lower,
	[CharClass.Space]:	whitespace,
	[CharClass.Alpha]:	alpha,
	[CharClass.Digit]:	digit,
	[CharClass.Print]:	print,
	[CharClass.Upper]:	upper,
	[CharClass.Blank]:	blank,
	[CharClass.Graph]:	graph,
	[CharClass.Punct]:	punct,
	[CharClass.Word]:	word,
	[CharClass.Xdigit]:	hex,
};

//-----------------------------------------------------------------------------
//	Pattern tree
//-----------------------------------------------------------------------------

export function text(c: string): string {
	return c;
}
export function concatenation(...parts: part[]): part[] | part {
	parts = parts.flat();
	return parts.length === 1 ? parts[0] : parts;
}

export interface alternation {
	type: 'alt';
	parts: part[];
}
export function alternation(...parts: part[]): alternation | part {
	return parts.length === 1 ? parts[0] : {type: 'alt', parts};
}

type noncaptureOptions = 'ahead' | 'behind' | 'neg_ahead' | 'neg_behind';
export interface noncapture {
	type: 'noncapture';
	part: part;
	options?: noncaptureOptions
};
export function noncapture(part: part, options?: noncaptureOptions): noncapture {
	return {type: 'noncapture', part, options};
}
export function lookAhead(part: part)		{ return noncapture(part, 'ahead'); }
export function negLookAhead(part: part)	{ return noncapture(part, 'neg_ahead'); }
export function lookBehind(part: part)		{ return noncapture(part, 'behind'); }
export function negLookBehind(part: part)	{ return noncapture(part, 'neg_behind'); }

export interface capture {
	type: 'capture';
	name?: string;
	part: part;
}
export function capture(part: part, name?: string): capture {
	return {type: 'capture', part, name};
}

export type quantifiedMod = 'greedy' | 'lazy';
export interface quantified {
	type: 'quantified';
	part: part;
	min: number;
	max: number; // -1 = inf
	mod: quantifiedMod;
}
export function repeatFrom(part: part, min: number, max = -1, mod: quantifiedMod = 'greedy'): quantified {
	return {type: 'quantified', part, min, max, mod};
}
export function repeat(part: part, n: number, mod: quantifiedMod = 'greedy')	{ return repeatFrom(part, n, n, mod); }
export function zeroOrMore(part: part, mod: quantifiedMod = 'greedy')			{ return repeatFrom(part, 0, -1, mod); }
export function oneOrMore(part: part, mod: quantifiedMod = 'greedy')			{ return repeatFrom(part, 1, -1, mod); }
export function optional(part: part, mod: quantifiedMod = 'greedy')				{ return repeatFrom(part, 0, 1, mod); }

export interface boundary {
	type: 'wordbound' | 'nowordbound' | 'inputboundstart' | 'inputboundend';
}
export function boundary(type: boundary['type']): boundary {
	return {type};
}
export const wordBoundary 		= boundary('wordbound');
export const nonWordBoundary 	= boundary('nowordbound');
export const startAnchor		= boundary('inputboundstart');
export const endAnchor 			= boundary('inputboundend');

export interface reference {
	type: 'reference';
	value: number|string;
}
export function reference(value: number|string): reference {
	return {type: 'reference', value};
}

export interface anyChar {
	type: 'any';
}
export const any: anyChar = {type: 'any'};

// \d \w \s and friends
export interface builtin {
	type: 'builtin';
	name: CharClass;
	negated?: boolean;
}
export function builtin(name: CharClass, negated?: boolean): builtin {
	return {type: 'builtin', name, negated};
}

export interface property {
	type: 'property';
	kind: PropertyKind;
	name: string;
	negated?: boolean;
}
export function property(kind: PropertyKind, name: string, negated?: boolean): property {
	return {type: 'property', kind, name, negated};
}

// a bracketed class; ranges are inclusive
export type setItem = number | [from: number, to: number] | builtin | property;
export interface set {
	type: 'set';
	items: setItem[];
	negated?: boolean;
}
export function set(items: setItem[], negated?: boolean): set {
	return {type: 'set', items, negated};
}

type _part = alternation | noncapture | capture | quantified | boundary | reference | anyChar | builtin | property | set;
export type part = string | part[] | _part;

export function type(part: part) {
	return typeof part === 'string'	? 'text'
			: Array.isArray(part)	? 'concat'
			: part.type;
}

export function is<T extends _part['type']|'text'|'concat'>(part: part, istype: T): part is (T extends 'text' ? string : T extends 'concat' ? part[] : Extract<_part, { type: T }>) {
	return type(part) === istype;
}
