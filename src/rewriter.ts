import { ByteCode, type Instruction } from './bytecode';
import { OptimizerError } from './errors';

//-----------------------------------------------------------------------------
//	Bytecode rewriting with jump relocation
//-----------------------------------------------------------------------------

// Replace the instructions in [start, end) with `replacement`; start === end inserts
export interface Edit {
	start:			number;
	end:			number;
	replacement:	ByteCode | number[];
}

// Jump targets inside a replacement are relative to the replacement itself; a target before 0 counts back from the edit's start, one at or past the replacement's end counts on from the edit's end
export class BytecodeRewriter {
	constructor(readonly program: ByteCode) {}

	private fail(message: string): never {
		throw new OptimizerError(message, this.program.disassemble());
	}

	private fragment(replacement: ByteCode | number[]) {
		if (Array.isArray(replacement))
			return this.program.fragment([...replacement]);
		if (replacement.strings !== this.program.strings)
			this.fail('replacement built against another string table');
		return replacement;
	}

	apply(edits: readonly Edit[]): ByteCode {
		const program	= this.program;
		const starts	= new Set(program.boundaries());

		let last = 0;
		for (const e of edits) {
			if (e.start > e.end)
				this.fail(`edit [${e.start}, ${e.end}) is reversed`);
			if (e.start < last)
				this.fail(`edit at ${e.start} overlaps or is out of order`);
			if (!starts.has(e.start) || !starts.has(e.end))
				this.fail(`edit [${e.start}, ${e.end}) does not fall on instruction boundaries`);
			last = e.end;
		}

		const out		= program.fragment();
		const map		= new Map<number, number>();
		const kept:		{at: number, inst: Instruction}[] = [];
		const patches:	{at: number, inst: Instruction, oldTarget: number}[] = [];

		const mark = (oldIp: number) => {
			if (!map.has(oldIp))
				map.set(oldIp, out.size);
		};

		let ip		= 0;
		let next	= 0;
		while (ip < program.size || next < edits.length) {
			const e = edits[next];
			if (e && e.start === ip) {
				const repl = this.fragment(e.replacement);
				mark(e.start);
				const base = out.size;
				for (const inst of repl.instructions()) {
					if (inst.jump) {
						const t = inst.jump.target;
						if (t < 0)
							patches.push({at: base + inst.ip, inst, oldTarget: e.start + t});
						else if (t >= repl.size)
							patches.push({at: base + inst.ip, inst, oldTarget: e.end + (t - repl.size)});
					}
				}
				out.append(repl);
				ip = e.end;
				++next;
				continue;
			}
			if (ip >= program.size)
				this.fail(`edit at ${e?.start} lies past the end of the program`);

			const inst = program.decode(ip);
			mark(ip);
			if (inst.jump)
				kept.push({at: out.size, inst});
			out.words.push(...program.words.slice(ip, ip + inst.width));
			ip += inst.width;
		}
		mark(program.size);

		const relocate = (at: number, inst: Instruction, oldTarget: number) => {
			const target = map.get(oldTarget);
			if (target === undefined)
				return this.fail(`jump at ${inst.ip} targets ${oldTarget}, which no longer exists`);
			out.words[at + 1] = ByteCode.offsetFor(inst.op, at, inst.width, target);
		};

		for (const {at, inst} of kept) {
			if (inst.jump)
				relocate(at, inst, inst.jump.target);
		}
		for (const {at, inst, oldTarget} of patches)
			relocate(at, inst, oldTarget);

		return out;
	}

	// visit each instruction once; a returned replacement stands in for that instruction
	rewrite(visit: (inst: Instruction, program: ByteCode) => ByteCode | number[] | undefined): ByteCode {
		const edits: Edit[] = [];
		for (const inst of this.program.instructions()) {
			const replacement = visit(inst, this.program);
			if (replacement)
				edits.push({start: inst.ip, end: inst.ip + inst.width, replacement});
		}
		return this.apply(edits);
	}
}

export function applyEdits(program: ByteCode, edits: readonly Edit[]) {
	return new BytecodeRewriter(program).apply(edits);
}
