import { CompareType, CharClass, isCharClass } from './opcodes';
import type { CompareOperand, StringTable } from './bytecode';
import { type characterClass, charClassSets, anySet, empty, codes, codeRange, fromRanges, type options } from './types';
import { type PropertyKind, hasProperty, swapCase } from './unicode';
import { OptimizerError } from './errors';

//-----------------------------------------------------------------------------
//	Compare interpretation
//-----------------------------------------------------------------------------

export interface PropertyTest {
	kind:	PropertyKind;
	name:	string;
}

// A single-character compare split into buckets; an operand lands in the negated bucket when exactly one of Inverse and TemporaryInverse applies to it
export interface CompareInterpretation {
	inverse:			boolean;
	hasReference:		boolean;
	ranges:				characterClass[];
	negatedRanges:		characterClass[];
	classes:			CharClass[];
	negatedClasses:		CharClass[];
	properties:			PropertyTest[];
	negatedProperties:	PropertyTest[];
}

export const propertyKinds: Partial<Record<CompareType, PropertyKind>> = {
	[CompareType.Property]:			'property',
	[CompareType.GeneralCategory]:	'gc',
	[CompareType.Script]:			'script',
	[CompareType.ScriptExtension]:	'scx',
};

export function testClass(name: CharClass, code: number, insensitive = false) {
	const set = charClassSets[name];
	return set.test(code) || (insensitive && set.test(swapCase(code)));
}

export function testProperty(p: PropertyTest, code: number, insensitive = false) {
	return hasProperty(p.kind, p.name, code) || (insensitive && swapCase(code) !== code && hasProperty(p.kind, p.name, swapCase(code)));
}

function singleCodePoint(s: string): number | undefined {
	const code = s.codePointAt(0);
	return code !== undefined && String.fromCodePoint(code) === s ? code : undefined;
}

// Returns undefined when the operands do something other than test one character against a union of simple predicates
export function interpretCompares(ops: CompareOperand[], strings: StringTable, allowSingleCodePointStrings = false): CompareInterpretation | undefined {
	const result: CompareInterpretation = {
		inverse:			false,
		hasReference:		false,
		ranges:				[],
		negatedRanges:		[],
		classes:			[],
		negatedClasses:		[],
		properties:			[],
		negatedProperties:	[],
	};

	let temporary	= false;
	let seenValue	= false;
	let depth		= 0;

	const negated = () => {
		const n = result.inverse !== temporary;
		temporary = false;
		seenValue = true;
		return n;
	};
	const addSet = (set: characterClass) => (negated() ? result.negatedRanges : result.ranges).push(set);

	for (const op of ops) {
		switch (op.type) {
			case CompareType.Inverse:
				if (seenValue)
					return undefined;
				result.inverse = !result.inverse;
				break;

			case CompareType.TemporaryInverse:
				temporary = !temporary;
				break;

			case CompareType.Char:
				addSet(codes(op.value));
				break;

			case CompareType.CharRange:
				addSet(codeRange(op.value, op.to ?? op.value));
				break;

			case CompareType.LookupTable:
				addSet(fromRanges(op.table?.sensitive ?? []));
				break;

			case CompareType.CharClass:
				if (!isCharClass(op.value))
					throw new OptimizerError(`unknown character class ${op.value}`);
				(negated() ? result.negatedClasses : result.classes).push(op.value);
				break;

			case CompareType.Property:
			case CompareType.GeneralCategory:
			case CompareType.Script:
			case CompareType.ScriptExtension: {
				const kind = propertyKinds[op.type];
				if (!kind)
					return undefined;
				(negated() ? result.negatedProperties : result.properties).push({kind, name: strings.string(op.value)});
				break;
			}

			case CompareType.String: {
				const code = allowSingleCodePointStrings ? singleCodePoint(strings.string(op.value)) : undefined;
				if (code === undefined)
					return undefined;
				addSet(codes(code));
				break;
			}

			case CompareType.StringSet: {
				if (!allowSingleCodePointStrings)
					return undefined;
				const list = strings.set(op.value).map(singleCodePoint);
				const set = empty();
				for (const code of list) {
					if (code === undefined)
						return undefined;
					set.set(code);
				}
				addSet(set);
				break;
			}

			case CompareType.Reference:
			case CompareType.NamedReference:
				result.hasReference = true;
				temporary = false;
				seenValue = true;
				break;

			case CompareType.Or:
				if (temporary)
					return undefined;
				++depth;
				break;

			case CompareType.EndAndOr:
				if (depth === 0)
					throw new OptimizerError('EndAndOr without an open Or');
				--depth;
				break;

			default:
				// AnyChar, And, Subtract
				return undefined;
		}
	}
	return result;
}

//-----------------------------------------------------------------------------
//	Bounds and exact tests
//-----------------------------------------------------------------------------

type Term = {set: characterClass} | {property: PropertyTest};

function terms(sets: characterClass[], classes: CharClass[], properties: PropertyTest[]): Term[] {
	return [
		...sets.map(set => ({set})),
		...classes.map(name => ({set: charClassSets[name]})),
		...properties.map(property => ({property})),
	];
}

const lower = (t: Term) => 'set' in t ? t.set : empty();
const upper = (t: Term) => 'set' in t ? t.set : anySet();

function unionOf(list: characterClass[]) {
	return list.reduce((acc, s) => acc.selfUnion(s), empty());
}

function intersectionOf(list: characterClass[]) {
	return list.reduce((acc, s) => acc.selfIntersect(s), anySet());
}

// every code point the compare might accept, case-sensitively
export function upperBound(interp: CompareInterpretation): characterClass {
	const R = terms(interp.ranges, interp.classes, interp.properties);
	const N = terms(interp.negatedRanges, interp.negatedClasses, interp.negatedProperties);

	if (!interp.inverse) {
		const hi = unionOf(R.map(upper));
		if (N.length === 1)
			hi.selfUnion(empty().selfUnion(lower(N[0])).selfComplement());
		else if (N.length > 1)
			return anySet();
		return hi;
	}

	const hi = unionOf(N.map(lower)).selfComplement();
	return R.length ? hi.selfIntersect(intersectionOf(R.map(upper))) : hi;
}

function testTerm(t: Term, code: number, insensitive: boolean) {
	return 'set' in t
		? t.set.test(code) || (insensitive && t.set.test(swapCase(code)))
		: testProperty(t.property, code, insensitive);
}

// whether the compare accepts `code`; ignores references
export function acceptsCode(interp: CompareInterpretation, code: number, insensitive = false) {
	const R = terms(interp.ranges, interp.classes, interp.properties);
	const N = terms(interp.negatedRanges, interp.negatedClasses, interp.negatedProperties);
	if (!interp.inverse)
		return R.some(t => testTerm(t, code, insensitive)) || N.some(t => !testTerm(t, code, insensitive));
	return !N.some(t => testTerm(t, code, insensitive)) && R.every(t => testTerm(t, code, insensitive));
}

// adds the other-case form of every ASCII letter in the set
export function caseClosure(set: characterClass): characterClass {
	const result = empty().selfUnion(set);
	for (const [from, to] of [[0x41, 0x5a], [0x61, 0x7a]]) {
		for (let c = from; c <= to; c++) {
			if (set.test(c))
				result.set(swapCase(c));
		}
	}
	return result;
}

const enumerationLimit = 4096;

// Could some single character satisfy both compares? Answers true whenever it cannot prove otherwise
export function hasOverlap(lhs: CompareOperand[], rhs: CompareOperand[], strings: StringTable, flags: options = {}): boolean {
	const a = interpretCompares(lhs, strings, true);
	const b = interpretCompares(rhs, strings, true);
	if (!a || !b || a.hasReference || b.hasReference)
		return true;

	const insensitive = !!flags.i;
	const close = (s: characterClass) => insensitive ? caseClosure(s) : s;

	const both = close(upperBound(a)).selfIntersect(close(upperBound(b)));
	if (both.empty())
		return false;

	if (both.isNegated() || both.size() > enumerationLimit)
		return true;

	for (const code of both.codes()) {
		if (acceptsCode(a, code, insensitive) && acceptsCode(b, code, insensitive))
			return true;
	}
	return false;
}

// whether the compare could accept any of `set`
export function overlapsSet(ops: CompareOperand[], strings: StringTable, set: characterClass, flags: options = {}): boolean {
	const a = interpretCompares(ops, strings, true);
	if (!a || a.hasReference)
		return true;
	const insensitive = !!flags.i;
	const both = (insensitive ? caseClosure(upperBound(a)) : upperBound(a)).selfIntersect(set);
	if (both.empty())
		return false;
	if (both.isNegated() || both.size() > enumerationLimit)
		return true;
	for (const code of both.codes()) {
		if (acceptsCode(a, code, insensitive))
			return true;
	}
	return false;
}
