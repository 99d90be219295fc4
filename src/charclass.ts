import { CompareType } from './opcodes';
import { ByteCode, type CompareOperand, entry, tableEntry } from './bytecode';
import { caseClosure } from './compare';
import { type characterClass, empty, codes, codeRange, fromRanges } from './types';

//-----------------------------------------------------------------------------
//	Character classes
//-----------------------------------------------------------------------------

function sameRanges(a: [number, number][], b: [number, number][]) {
	return a.length === b.length && a.every(([from, to], i) => from === b[i][0] && to === b[i][1]);
}

// sorted and coalesced, with a case-folded shadow only when folding adds anything
export function lookupTable(set: characterClass): CompareOperand {
	const sensitive		= set.inclusiveRanges();
	const insensitive	= caseClosure(set).inclusiveRanges();
	return tableEntry(sensitive, sameRanges(sensitive, insensitive) ? [] : insensitive);
}

function setOf(op: CompareOperand): characterClass | undefined {
	switch (op.type) {
		case CompareType.Char:			return codes(op.value);
		case CompareType.CharRange:		return codeRange(op.value, op.to ?? op.value);
		case CompareType.LookupTable:	return fromRanges(op.table?.sensitive ?? []);
		default:						return undefined;
	}
}

// Batches plain characters and ranges into lookup tables; everything else passes through in order
export function compileCharacterClassOperands(operands: CompareOperand[]): CompareOperand[] {
	if (operands.length <= 1)
		return operands;

	const out:		CompareOperand[] = [];
	const groups:	CompareType[] = [];
	let table		= empty();
	let inverted:	characterClass | undefined;
	let temporary	= false;

	// a temporarily inverted range R contributes not-R, and a union of complements is the complement of the intersection
	const flush = () => {
		if (!table.empty())
			out.push(lookupTable(table));
		if (inverted)
			out.push(entry(CompareType.TemporaryInverse), lookupTable(inverted));
		table		= empty();
		inverted	= undefined;
	};

	const passThrough = (op: CompareOperand) => {
		flush();
		if (temporary)
			out.push(entry(CompareType.TemporaryInverse));
		temporary = false;
		out.push(op);
	};

	for (const op of operands) {
		const top		= groups.at(-1);
		const separate	= top === CompareType.And || top === CompareType.Subtract;

		switch (op.type) {
			case CompareType.TemporaryInverse:
				temporary = !temporary;
				break;

			case CompareType.Char:
			case CompareType.CharRange:
			case CompareType.LookupTable: {
				const set = setOf(op);
				if (separate || !set) {
					passThrough(op);
				} else if (temporary) {
					inverted	= inverted ? inverted.selfIntersect(set) : set;
					temporary	= false;
				} else {
					table.selfUnion(set);
				}
				break;
			}

			case CompareType.Inverse:
				flush();
				out.push(op);
				break;

			case CompareType.Or:
			case CompareType.And:
			case CompareType.Subtract:
				passThrough(op);
				groups.push(op.type);
				break;

			case CompareType.EndAndOr:
				flush();
				temporary = false;
				out.push(op);
				groups.pop();
				break;

			default:
				passThrough(op);
				break;
		}
	}
	flush();
	return out;
}

export function compileCharacterClass(target: ByteCode, operands: CompareOperand[]) {
	return target.emitCompare(...compileCharacterClassOperands(operands));
}
