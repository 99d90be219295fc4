import {
	OpCode, CompareType, ForkIfCondition, BoundaryCheckType,
	opCodeNames, compareTypeNames, charClassNames,
	isOpCode, isCompareType, fixedWidth, valuelessTypes, jumpOps,
} from './opcodes';
import { OptimizerError } from './errors';

//-----------------------------------------------------------------------------
//	String table
//-----------------------------------------------------------------------------

// Strings referenced from operands by index; shared by every fragment of one program
export class StringTable {
	strings:	string[] = [];
	sets:		string[][] = [];

	intern(s: string): number {
		const i = this.strings.indexOf(s);
		return i >= 0 ? i : this.strings.push(s) - 1;
	}

	internSet(list: string[]): number {
		const key = JSON.stringify(list);
		const i = this.sets.findIndex(s => JSON.stringify(s) === key);
		return i >= 0 ? i : this.sets.push([...list]) - 1;
	}

	string(i: number): string {
		const s = this.strings[i];
		if (s === undefined)
			throw new OptimizerError(`string index ${i} out of range`);
		return s;
	}

	clone(): StringTable {
		const copy = new StringTable();
		copy.strings	= [...this.strings];
		copy.sets		= this.sets.map(s => [...s]);
		return copy;
	}

	set(i: number): string[] {
		const s = this.sets[i];
		if (s === undefined)
			throw new OptimizerError(`string set index ${i} out of range`);
		return s;
	}
}

//-----------------------------------------------------------------------------
//	Decoded forms
//-----------------------------------------------------------------------------

export interface JumpInfo {
	offset:		number;
	target:		number;
	backward:	boolean;
}

export interface Instruction {
	ip:			number;
	op:			OpCode;
	width:		number;
	jump?:		JumpInfo;
}

// one compare operand; `value` is 0 for operand types that carry none, CharRange bounds are inclusive
export interface CompareEntry {
	type:	CompareType;
	value:	number;
	to?:	number;
}

export interface LookupTable {
	sensitive:		[number, number][];
	insensitive:	[number, number][];
}

export interface CompareOperand extends CompareEntry {
	table?: LookupTable;
}

export function entry(type: CompareType, value = 0, to?: number): CompareOperand {
	return to === undefined ? {type, value} : {type, value, to};
}

export function charEntry(c: number) {
	return entry(CompareType.Char, c);
}

export function rangeEntry(from: number, to: number) {
	return entry(CompareType.CharRange, from, to);
}

export function tableEntry(sensitive: [number, number][], insensitive: [number, number][] = []): CompareOperand {
	return {type: CompareType.LookupTable, value: 0, table: {sensitive, insensitive}};
}

//-----------------------------------------------------------------------------
//	Encoding
//-----------------------------------------------------------------------------

export function operandWords(op: CompareOperand): number[] {
	if (op.type === CompareType.Undefined)
		throw new OptimizerError('cannot encode an undefined compare operand');

	if (valuelessTypes.has(op.type))
		return [op.type];

	switch (op.type) {
		case CompareType.CharRange:
			return [op.type, op.value, op.to ?? op.value];

		case CompareType.LookupTable: {
			const table = op.table ?? {sensitive: [], insensitive: []};
			return [
				op.type, table.sensitive.length, table.insensitive.length,
				...table.sensitive.flat(), ...table.insensitive.flat()
			];
		}
		default:
			return [op.type, op.value];
	}
}

export function compareWords(ops: CompareOperand[]): number[] {
	const args = ops.flatMap(operandWords);
	return [OpCode.Compare, ops.length, args.length, ...args];
}

export function compareSimpleWords(op: CompareOperand): number[] {
	const args = operandWords(op);
	return [OpCode.CompareSimple, args.length, ...args];
}

//-----------------------------------------------------------------------------
//	ByteCode
//-----------------------------------------------------------------------------

export class ByteCode {
	constructor(public words: number[] = [], public strings = new StringTable()) {}

	get size() {
		return this.words.length;
	}

	// an empty program sharing this string table
	fragment(words: number[] = []) {
		return new ByteCode(words, this.strings);
	}

	// a copy with its own string table; fragments of the copy share that table
	clone() {
		return new ByteCode([...this.words], this.strings.clone());
	}

	emit(...words: number[]) {
		this.words.push(...words);
		return this;
	}

	emitCompare(...ops: CompareOperand[]) {
		return this.emit(...compareWords(ops));
	}

	append(other: ByteCode) {
		if (other.strings !== this.strings)
			throw new OptimizerError('cannot append bytecode built against another string table');
		this.words.push(...other.words);
		return this;
	}

	slice(start: number, end = this.size) {
		return new ByteCode(this.words.slice(start, end), this.strings);
	}

	word(ip: number): number {
		const w = this.words[ip];
		if (w === undefined)
			throw new OptimizerError(`read past end of program at ${ip}`);
		return w;
	}

	opAt(ip: number): OpCode {
		const op = this.word(ip);
		if (!isOpCode(op))
			throw new OptimizerError(`unknown opcode ${op} at ${ip}`);
		return op;
	}

	width(ip: number): number {
		const op = this.opAt(ip);
		switch (op) {
			case OpCode.Compare:		return 3 + this.word(ip + 2);
			case OpCode.CompareSimple:	return 2 + this.word(ip + 1);
			default:					return fixedWidth(op) ?? 1;
		}
	}

	decode(ip: number): Instruction {
		const op	= this.opAt(ip);
		const width	= this.width(ip);
		if (ip + width > this.size)
			throw new OptimizerError(`instruction at ${ip} runs past end of program`);

		if (!jumpOps.has(op))
			return {ip, op, width};

		const offset = this.word(ip + 1);
		const target = op === OpCode.Repeat ? ip - offset : ip + width + offset;
		return {ip, op, width, jump: {offset, target, backward: target <= ip}};
	}

	*instructions(start = 0, end = this.size): Generator<Instruction> {
		for (let ip = start; ip < end;) {
			const inst = this.decode(ip);
			yield inst;
			ip += inst.width;
		}
	}

	// instruction starts in order, with the size as a final sentinel
	boundaries(): number[] {
		const result: number[] = [];
		for (const inst of this.instructions())
			result.push(inst.ip);
		result.push(this.size);
		return result;
	}

	// jump offset that lands on `target` when written into the instruction at `ip`
	static offsetFor(op: OpCode, ip: number, width: number, target: number) {
		return op === OpCode.Repeat ? ip - target : target - (ip + width);
	}

	//-------------------------------------------------------------------------
	//	Compare operands
	//-------------------------------------------------------------------------

	compareOperands(ip: number): CompareOperand[] {
		const op = this.opAt(ip);
		if (op === OpCode.Compare)
			return this.readOperands(ip + 3, this.word(ip + 1), ip + 3 + this.word(ip + 2));
		if (op === OpCode.CompareSimple)
			return this.readOperands(ip + 2, 1, ip + 2 + this.word(ip + 1));
		throw new OptimizerError(`no compare at ${ip}`);
	}

	// operands with any LookupTable spread out as its case-sensitive CharRange entries
	flatCompares(ip: number): CompareEntry[] {
		return this.compareOperands(ip).flatMap((op): CompareEntry[] => op.table
			? op.table.sensitive.map(([from, to]) => ({type: CompareType.CharRange, value: from, to}))
			: [op.to === undefined ? {type: op.type, value: op.value} : {type: op.type, value: op.value, to: op.to}]
		);
	}

	private readOperands(start: number, count: number, end: number): CompareOperand[] {
		const result: CompareOperand[] = [];
		let p = start;
		for (let k = 0; k < count; k++) {
			const type = this.word(p++);
			if (!isCompareType(type) || type === CompareType.Undefined)
				throw new OptimizerError(`bad compare operand type ${type} at ${p - 1}`);

			if (valuelessTypes.has(type)) {
				result.push({type, value: 0});

			} else if (type === CompareType.CharRange) {
				result.push({type, value: this.word(p), to: this.word(p + 1)});
				p += 2;

			} else if (type === CompareType.LookupTable) {
				const sc = this.word(p), ic = this.word(p + 1);
				p += 2;
				const pairs = (n: number) => {
					const list: [number, number][] = [];
					for (let j = 0; j < n; j++, p += 2)
						list.push([this.word(p), this.word(p + 1)]);
					return list;
				};
				const sensitive		= pairs(sc);
				const insensitive	= pairs(ic);
				result.push({type, value: 0, table: {sensitive, insensitive}});

			} else {
				result.push({type, value: this.word(p++)});
			}
		}
		if (p !== end)
			throw new OptimizerError(`compare operands at ${start} occupy ${p - start} words, expected ${end - start}`);
		return result;
	}

	//-------------------------------------------------------------------------
	//	Listing
	//-------------------------------------------------------------------------

	describeOperand(op: CompareOperand): string {
		const name = compareTypeNames[op.type];
		switch (op.type) {
			case CompareType.Char:				return `${name} ${showChar(op.value)}`;
			case CompareType.CharRange:			return `${name} ${showChar(op.value)}-${showChar(op.to ?? op.value)}`;
			case CompareType.String:			return `${name} ${JSON.stringify(this.strings.strings[op.value])}`;
			case CompareType.StringSet:			return `${name} ${JSON.stringify(this.strings.sets[op.value])}`;
			case CompareType.CharClass:			return `${name} ${charClassNames[op.value] ?? op.value}`;
			case CompareType.Reference:			return `${name} ${op.value}`;
			case CompareType.NamedReference:
			case CompareType.Property:
			case CompareType.GeneralCategory:
			case CompareType.Script:
			case CompareType.ScriptExtension:	return `${name} ${this.strings.strings[op.value] ?? op.value}`;
			case CompareType.LookupTable: {
				const show = (list: [number, number][]) => list.map(([a, b]) => a === b ? showChar(a) : `${showChar(a)}-${showChar(b)}`).join(' ');
				const table = op.table;
				return table ? `${name} [${show(table.sensitive)}]${table.insensitive.length ? ` i[${show(table.insensitive)}]` : ''}` : name;
			}
			default:							return name;
		}
	}

	describe(inst: Instruction): string {
		const {ip, op} = inst;
		const name = opCodeNames[op];
		const arrow = inst.jump ? ` ${inst.jump.offset} -> ${inst.jump.target}` : '';
		switch (op) {
			case OpCode.Compare:
			case OpCode.CompareSimple:
				return `${name} [${this.compareOperands(ip).map(o => this.describeOperand(o)).join(', ')}]`;
			case OpCode.JumpNonEmpty:
				return `${name}${arrow} checkpoint ${this.word(ip + 2)} ${opCodeNames[this.word(ip + 3)] ?? this.word(ip + 3)}`;
			case OpCode.ForkIf:
				return `${name}${arrow} ${opCodeNames[this.word(ip + 2)] ?? this.word(ip + 2)}${this.word(ip + 3) === ForkIfCondition.AtStartOfLine ? ' AtStartOfLine' : ''}`;
			case OpCode.Repeat:
				return `${name}${arrow} count ${this.word(ip + 2)} id ${this.word(ip + 3)}`;
			case OpCode.RSeekTo:
				return `${name} ${showChar(this.word(ip + 1))}`;
			case OpCode.CheckBoundary:
				return `${name} ${this.word(ip + 1) === BoundaryCheckType.Word ? 'Word' : 'NonWord'}`;
			case OpCode.SaveRightNamedCaptureGroup:
				return `${name} ${this.strings.strings[this.word(ip + 1)]} ${this.word(ip + 2)}`;
			case OpCode.GoBack:
			case OpCode.SetStepBack:
			case OpCode.ClearCaptureGroup:
			case OpCode.SaveLeftCaptureGroup:
			case OpCode.SaveRightCaptureGroup:
			case OpCode.ResetRepeat:
			case OpCode.Checkpoint:
			case OpCode.FailIfEmpty:
				return `${name} ${this.word(ip + 1)}`;
			default:
				return name + arrow;
		}
	}

	disassemble(): string {
		const lines: string[] = [];
		for (let ip = 0; ip < this.size;) {
			const addr = ip.toString().padStart(4, '0');
			try {
				const inst = this.decode(ip);
				lines.push(`${addr}  ${this.describe(inst)}`);
				ip += inst.width;
			} catch (e) {
				if (!(e instanceof OptimizerError))
					throw e;
				lines.push(`${addr}  ??? ${e.message}`);
				break;
			}
		}
		return lines.join('\n');
	}
}

function showChar(c: number) {
	return c >= 0x21 && c < 0x7f ? `'${String.fromCharCode(c)}'` : `U+${c.toString(16).toUpperCase().padStart(4, '0')}`;
}
