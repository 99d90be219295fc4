import { OpCode, CompareType, BoundaryCheckType } from './opcodes';
import { ByteCode, type CompareOperand, entry, charEntry, rangeEntry } from './bytecode';
import { compileAlternation } from './alternation';
import { compileCharacterClass } from './charclass';
import type { part, options, quantified, setItem, builtin, property } from './types';
import type { PropertyKind } from './unicode';
import { CodegenError } from './errors';

//-----------------------------------------------------------------------------
//	Pattern tree to bytecode
//-----------------------------------------------------------------------------

export interface CodegenOptions {
	flags?:	options;
	log?:	(message: string) => void;
}

const propertyTypes: Record<PropertyKind, CompareType> = {
	property:	CompareType.Property,
	gc:			CompareType.GeneralCategory,
	script:		CompareType.Script,
	scx:		CompareType.ScriptExtension,
};

// shortest and longest match of a part; Infinity when unbounded
export function matchLength(p: part): [number, number] {
	if (typeof p === 'string') {
		const n = Array.from(p).length;
		return [n, n];
	}
	if (Array.isArray(p)) {
		return p.reduce<[number, number]>(([min, max], q) => {
			const [a, b] = matchLength(q);
			return [min + a, max + b];
		}, [0, 0]);
	}
	switch (p.type) {
		case 'alt': {
			const lengths = p.parts.map(matchLength);
			return lengths.length
				? [Math.min(...lengths.map(l => l[0])), Math.max(...lengths.map(l => l[1]))]
				: [0, 0];
		}
		case 'quantified': {
			const [min, max] = matchLength(p.part);
			return [min * p.min, p.max === -1 ? (max === 0 ? 0 : Infinity) : max * p.max];
		}
		case 'noncapture':
			return p.options ? [0, 0] : matchLength(p.part);
		case 'capture':
			return matchLength(p.part);
		case 'reference':
			return [0, Infinity];
		case 'set':
		case 'builtin':
		case 'property':
		case 'any':
			return [1, 1];
		default:
			return [0, 0];
	}
}

export function buildByteCode(root: part, opts: CodegenOptions = {}): ByteCode {
	const flags		= opts.flags ?? {};
	const program	= new ByteCode();
	let captureId	= 0;
	let checkpointId= 0;
	let repeatId	= 0;

	function fragment(p: part) {
		const out = program.fragment();
		build(p, out);
		return out;
	}

	function setOperands(items: setItem[], negated?: boolean): CompareOperand[] {
		const ops: CompareOperand[] = negated ? [entry(CompareType.Inverse)] : [];
		for (const item of items) {
			if (typeof item === 'number')
				ops.push(charEntry(item));
			else if (Array.isArray(item))
				ops.push(rangeEntry(item[0], item[1]));
			else
				ops.push(...escapeOperands(item));
		}
		return ops;
	}

	function escapeOperands(item: builtin | property): CompareOperand[] {
		const op = item.type === 'builtin'
			? entry(CompareType.CharClass, item.name)
			: entry(propertyTypes[item.kind], program.strings.intern(item.name));
		return item.negated ? [entry(CompareType.TemporaryInverse), op] : [op];
	}

	// LABEL _LOOP; REGEXP; REPEAT _LOOP N-1; REGEXP
	function repetitionN(out: ByteCode, body: ByteCode, n: number) {
		if (n === 0)
			return;
		out.append(body);
		if (n > 1) {
			out.emit(OpCode.Repeat, body.size, n - 1, repeatId++);
			out.append(body);
		}
	}

	function quantify(out: ByteCode, q: quantified) {
		const body		= fragment(q.part);
		const S			= body.size;
		const greedy	= q.mod === 'greedy';
		const skip		= greedy ? OpCode.ForkStay : OpCode.ForkJump;
		const again		= greedy ? OpCode.ForkJump : OpCode.ForkStay;
		const {min, max} = q;

		if (max === 0)
			return;

		if (max === -1) {
			if (min === 0) {
				// FORK _END; LABEL _START; CHECKPOINT _C; REGEXP; JUMP_NONEMPTY _C _START JUMP; LABEL _END
				const c = checkpointId++;
				out.emit(skip, S + 6);
				out.emit(OpCode.Checkpoint, c);
				out.append(body);
				out.emit(OpCode.JumpNonEmpty, -(S + 8), c, OpCode.Jump);
				return;
			}
			// the last required copy doubles as the loop body
			if (min > 1) {
				out.append(body);
				out.emit(OpCode.Repeat, S, min - 1, repeatId++);
			}
			const c = checkpointId++;
			out.emit(OpCode.Checkpoint, c);
			out.append(body);
			out.emit(OpCode.JumpNonEmpty, -(S + 6), c, again);
			return;
		}

		// optional copies of a body that can match empty must not end where they began
		const optional = () => {
			if (matchLength(q.part)[0] > 0)
				return body;
			const c = checkpointId++;
			return program.fragment([OpCode.Checkpoint, c]).append(body).emit(OpCode.FailIfEmpty, c);
		};

		if (min === 0 && max === 1) {
			const opt = optional();
			out.emit(skip, opt.size);
			out.append(opt);
			return;
		}

		repetitionN(out, body, min);
		const reps = max - min;
		if (reps === 0)
			return;

		// FORK END; REGEXP; REPEAT _MAX_LOOP MAX-MIN-1; FORK END; REGEXP; LABEL END; RESET _MAX_LOOP
		const opt	= optional();
		const start	= out.size;
		out.emit(skip, 0);
		out.append(opt);
		if (reps > 1) {
			const id = repeatId++;
			out.emit(OpCode.Repeat, opt.size + 2, reps - 1, id);
			const second = out.size;
			out.emit(skip, 0);
			out.append(opt);
			const end = out.size;
			out.words[start + 1]	= end - (start + 2);
			out.words[second + 1]	= end - (second + 2);
			out.emit(OpCode.ResetRepeat, id);
		} else {
			out.words[start + 1] = out.size - (start + 2);
		}
	}

	function lookaround(out: ByteCode, p: part, kind: 'ahead' | 'behind' | 'neg_ahead' | 'neg_behind') {
		const body	= fragment(p);
		const S		= body.size;
		switch (kind) {
			case 'ahead':
				out.emit(OpCode.Save, OpCode.ForkJump, 1, OpCode.PopSaved);
				out.append(body);
				out.emit(OpCode.Restore);
				break;

			case 'neg_ahead':
				out.emit(OpCode.Jump, S + 1);
				out.append(body);
				out.emit(OpCode.FailForks, OpCode.Save, OpCode.ForkJump, -(S + 4), OpCode.Restore);
				break;

			case 'behind': {
				const [min] = matchLength(p);
				out.emit(OpCode.Save, OpCode.SetStepBack, min - 1, OpCode.IncStepBack, OpCode.ForkJump, 3, OpCode.CheckStepBack, OpCode.Jump, -6);
				out.append(body);
				out.emit(OpCode.ForkJump, -(S + 8), OpCode.CheckSavedPosition, OpCode.Restore);
				break;
			}

			case 'neg_behind': {
				const [min, max] = matchLength(p);
				if (min !== max)
					throw new CodegenError('negative lookbehind needs a fixed length body');
				out.emit(OpCode.Jump, S + 3, OpCode.GoBack, min);
				out.append(body);
				out.emit(OpCode.FailForks, OpCode.Save, OpCode.ForkJump, -(S + 6), OpCode.Restore);
				break;
			}
		}
	}

	function build(p: part, out: ByteCode) {
		if (typeof p === 'string') {
			for (const c of p)
				out.emitCompare(charEntry(c.codePointAt(0) ?? 0));
			return;
		}

		if (Array.isArray(p)) {
			for (const i of p)
				build(i, out);
			return;
		}

		switch (p.type) {
			case 'alt':
				compileAlternation(out, p.parts.map(fragment), {flags, log: opts.log});
				break;

			case 'quantified':
				quantify(out, p);
				break;

			case 'capture': {
				const id = ++captureId;
				out.emit(OpCode.SaveLeftCaptureGroup, id);
				build(p.part, out);
				if (p.name)
					out.emit(OpCode.SaveRightNamedCaptureGroup, program.strings.intern(p.name), id);
				else
					out.emit(OpCode.SaveRightCaptureGroup, id);
				break;
			}

			case 'noncapture':
				if (p.options)
					lookaround(out, p.part, p.options);
				else
					build(p.part, out);
				break;

			case 'set':
				compileCharacterClass(out, setOperands(p.items, p.negated));
				break;

			case 'builtin':
			case 'property':
				compileCharacterClass(out, escapeOperands(p));
				break;

			case 'any':
				out.emitCompare(entry(CompareType.AnyChar));
				break;

			case 'reference':
				out.emitCompare(typeof p.value === 'number'
					? entry(CompareType.Reference, p.value)
					: entry(CompareType.NamedReference, program.strings.intern(p.value))
				);
				break;

			case 'wordbound':
				out.emit(OpCode.CheckBoundary, BoundaryCheckType.Word);
				break;
			case 'nowordbound':
				out.emit(OpCode.CheckBoundary, BoundaryCheckType.NonWord);
				break;
			case 'inputboundstart':
				out.emit(OpCode.CheckBegin);
				break;
			case 'inputboundend':
				out.emit(OpCode.CheckEnd);
				break;
		}
	}

	build(root, program);
	return program;
}
