import { OpCode, CompareType, isOpCode } from './opcodes';
import { ByteCode, type Instruction, type CompareOperand, compareWords, compareSimpleWords } from './bytecode';
import type { BasicBlock } from './blocks';
import { type Edit, applyEdits, BytecodeRewriter } from './rewriter';
import { interpretCompares, hasOverlap, overlapsSet, type CompareInterpretation } from './compare';
import { type characterClass, eol, empty, type options } from './types';
import { toLower } from './unicode';

export interface PassContext {
	flags:	options;
	log:	(message: string) => void;
}

export interface OptimizationData {
	anchoredToLineStart:		boolean;
	startingRanges:				[number, number][];
	startingRangesInsensitive:	[number, number][];
	// UTF-16 code units; when present the whole program is a plain substring search
	substring?:					number[];
}

// instructions with no effect on which characters get consumed
const bookkeeping: ReadonlySet<OpCode> = new Set([
	OpCode.Checkpoint,
	OpCode.Save,
	OpCode.SaveLeftCaptureGroup,
	OpCode.SaveRightCaptureGroup,
	OpCode.SaveRightNamedCaptureGroup,
	OpCode.ClearCaptureGroup,
]);

export function blockInstructions(program: ByteCode, block: BasicBlock) {
	return program.instructions(block.start, block.end + program.width(block.end));
}

function isCompare(inst: Instruction) {
	return inst.op === OpCode.Compare || inst.op === OpCode.CompareSimple;
}

// a lone Char operand
function literalChar(program: ByteCode, inst: Instruction): number | undefined {
	if (inst.op !== OpCode.Compare)
		return undefined;
	const ops = program.compareOperands(inst.ip);
	return ops.length === 1 && ops[0].type === CompareType.Char ? ops[0].value : undefined;
}

function patched(program: ByteCode, inst: Instruction, at: number, value: number): Edit {
	const words = program.words.slice(inst.ip, inst.ip + inst.width);
	words[at - inst.ip] = value;
	return {start: inst.ip, end: inst.ip + inst.width, replacement: words};
}

//-----------------------------------------------------------------------------
//	1. Drop jumps and forks that go nowhere
//-----------------------------------------------------------------------------

const droppable: ReadonlySet<OpCode> = new Set([
	OpCode.Jump,
	OpCode.JumpNonEmpty,
	OpCode.ForkJump,
	OpCode.ForkStay,
	OpCode.ForkReplaceJump,
	OpCode.ForkReplaceStay,
	OpCode.ForkIf,
]);

// repeats until none are left, since removing one can bring another jump's offset down to zero
export function dropUselessJumps(program: ByteCode, ctx: PassContext): ByteCode {
	for (;;) {
		const edits: Edit[] = [];
		for (const inst of program.instructions()) {
			if (droppable.has(inst.op) && inst.jump?.offset === 0)
				edits.push({start: inst.ip, end: inst.ip + inst.width, replacement: []});
		}
		if (!edits.length)
			return program;
		ctx.log(`dropped ${edits.length} zero-offset jumps`);
		program = applyEdits(program, edits);
	}
}

//-----------------------------------------------------------------------------
//	2. Whole pattern as a substring search
//-----------------------------------------------------------------------------

export function substringSearch(program: ByteCode, blocks: BasicBlock[], ctx: PassContext): number[] | undefined {
	if (ctx.flags.i)
		return undefined;
	if (program.size === 0 || blocks.length === 0)
		return [];
	if (blocks.length !== 1)
		return undefined;

	let text = '';
	for (const inst of program.instructions()) {
		const c = literalChar(program, inst);
		if (c === undefined)
			return undefined;
		text += String.fromCodePoint(c);
	}
	ctx.log(`whole pattern is the literal ${JSON.stringify(text)}`);
	return Array.from({length: text.length}, (_, i) => text.charCodeAt(i));
}

//-----------------------------------------------------------------------------
//	3. Loops whose exit cannot start with anything the body matches become atomic
//-----------------------------------------------------------------------------

const replaceFork: Partial<Record<OpCode, OpCode>> = {
	[OpCode.ForkJump]: OpCode.ForkReplaceJump,
	[OpCode.ForkStay]: OpCode.ForkReplaceStay,
};

// compares the loop body can run, or undefined when the body does something the check cannot see through
function loopBodyCompares(program: ByteCode, start: number, end: number): CompareOperand[][] | undefined {
	const result: CompareOperand[][] = [];
	for (const inst of program.instructions(start, end)) {
		switch (inst.op) {
			case OpCode.Compare:
			case OpCode.CompareSimple: {
				const ops = program.compareOperands(inst.ip);
				if (ops.some(o => o.type === CompareType.AnyChar || o.type === CompareType.Reference || o.type === CompareType.NamedReference))
					return undefined;
				result.push(ops);
				break;
			}
			// straight-line bodies only: a fork inside would leave entries above the one being replaced
			case OpCode.Checkpoint:
			case OpCode.SaveLeftCaptureGroup:
			case OpCode.SaveRightCaptureGroup:
			case OpCode.SaveRightNamedCaptureGroup:
			case OpCode.ClearCaptureGroup:
			case OpCode.FailIfEmpty:
			case OpCode.CheckBegin:
			case OpCode.CheckEnd:
				break;

			default:
				return undefined;
		}
	}
	return result.length ? result : undefined;
}

// does everything reachable from `ip` after leaving the loop start with a character the body can never match?
function followIsDisjoint(program: ByteCode, ip: number, body: CompareOperand[][], ctx: PassContext): boolean {
	const visited = new Set<number>();
	for (;;) {
		if (ip >= program.size)
			return true;
		if (visited.has(ip))
			return false;
		visited.add(ip);

		const inst = program.decode(ip);
		if (bookkeeping.has(inst.op) || inst.op === OpCode.ResetRepeat) {
			ip += inst.width;
			continue;
		}
		switch (inst.op) {
			case OpCode.Exit:
				return true;

			case OpCode.Compare:
			case OpCode.CompareSimple: {
				const ops = program.compareOperands(ip);
				return !body.some(b => hasOverlap(b, ops, program.strings, ctx.flags));
			}
			case OpCode.CheckEnd:
				return !ctx.flags.m || !body.some(b => overlapsSet(b, program.strings, eol, ctx.flags));

			case OpCode.Jump:
				if (!inst.jump || inst.jump.backward)
					return false;
				ip = inst.jump.target;
				break;

			default:
				return false;
		}
	}
}

interface LoopCandidate {
	inst:	Instruction;
	at:		number;		// word to patch
	value:	OpCode;
	body:	[number, number];
	follow:	number;
}

function findLoop(program: ByteCode, blocks: BasicBlock[], i: number): LoopCandidate | undefined {
	const bb = blocks[i];
	if (bb.end >= program.size)
		return undefined;

	const inst = program.decode(bb.end);
	const next = inst.ip + inst.width;

	// block forks back to its own start
	if (inst.jump?.target === bb.start && bb.start < bb.end) {
		const form = inst.op === OpCode.JumpNonEmpty ? program.word(inst.ip + 3) : inst.op;
		const value = isOpCode(form) ? replaceFork[form] : undefined;
		if (value !== undefined)
			return {inst, at: inst.op === OpCode.JumpNonEmpty ? inst.ip + 3 : inst.ip, value, body: [bb.start, bb.end], follow: next};
	}

	// header forks past a body that jumps back to the header
	const value = replaceFork[inst.op];
	const loop = blocks[i + 1];
	if (value !== undefined && inst.jump && loop && loop.start === next && loop.end < program.size) {
		const back = program.decode(loop.end);
		const unconditional = back.op === OpCode.Jump || (back.op === OpCode.JumpNonEmpty && program.word(back.ip + 3) === OpCode.Jump);
		if (unconditional && back.jump?.target === inst.ip && inst.jump.target === back.ip + back.width)
			return {inst, at: inst.ip, value, body: [loop.start, loop.end], follow: inst.jump.target};
	}
	return undefined;
}

export function rewriteLoopsAsAtomic(program: ByteCode, blocks: BasicBlock[], ctx: PassContext): ByteCode {
	const edits = new Map<number, Edit>();

	for (let i = 0; i < blocks.length; i++) {
		const loop = findLoop(program, blocks, i);
		if (!loop || edits.has(loop.inst.ip))
			continue;

		const body = loopBodyCompares(program, loop.body[0], loop.body[1]);
		if (!body || !followIsDisjoint(program, loop.follow, body, ctx))
			continue;

		ctx.log(`loop closed at ${loop.inst.ip} made atomic`);
		edits.set(loop.inst.ip, patched(program, loop.inst, loop.at, loop.value));
	}

	if (!edits.size)
		return program;
	return applyEdits(program, [...edits.values()].sort((a, b) => a.start - b.start));
}

//-----------------------------------------------------------------------------
//	4. Runs of single character compares become one string compare
//-----------------------------------------------------------------------------

export function mergeAdjacentCompares(program: ByteCode, blocks: BasicBlock[], ctx: PassContext): ByteCode {
	const edits: Edit[] = [];

	for (const block of blocks) {
		let run: Instruction[] = [];
		let text = '';

		const flush = () => {
			if (run.length >= 2) {
				const first = run[0], last = run[run.length - 1];
				const index = program.strings.intern(text);
				edits.push({start: first.ip, end: last.ip + last.width, replacement: compareWords([{type: CompareType.String, value: index}])});
				ctx.log(`merged ${run.length} compares at ${first.ip} into ${JSON.stringify(text)}`);
			}
			run = [];
			text = '';
		};

		for (const inst of blockInstructions(program, block)) {
			const c = literalChar(program, inst);
			if (c === undefined) {
				flush();
			} else {
				run.push(inst);
				text += String.fromCodePoint(c);
			}
		}
		flush();
	}

	return edits.length ? applyEdits(program, edits) : program;
}

//-----------------------------------------------------------------------------
//	5. Greedy .* before a single character becomes a backwards seek
//-----------------------------------------------------------------------------

function singleCode(interp: CompareInterpretation | undefined): number | undefined {
	if (!interp || interp.inverse || interp.hasReference
		|| interp.negatedRanges.length || interp.classes.length || interp.negatedClasses.length
		|| interp.properties.length || interp.negatedProperties.length)
		return undefined;

	const set = interp.ranges.reduce((acc: characterClass, r) => acc.selfUnion(r), empty());
	if (set.isNegated() || set.size() !== 1)
		return undefined;
	for (const code of set.codes())
		return code;
	return undefined;
}

// end of a ForkStay, Checkpoint, Compare AnyChar, [FailIfEmpty], JumpNonEmpty loop starting at `fork`
function dotStarEnd(program: ByteCode, fork: Instruction): number | undefined {
	if (fork.op !== OpCode.ForkStay || !fork.jump)
		return undefined;

	let ip = fork.ip + fork.width;
	if (ip >= program.size || program.word(ip) !== OpCode.Checkpoint)
		return undefined;
	const checkpoint = program.word(ip + 1);
	ip += 2;

	if (ip >= program.size || program.word(ip) !== OpCode.Compare)
		return undefined;
	const ops = program.compareOperands(ip);
	if (ops.length !== 1 || ops[0].type !== CompareType.AnyChar)
		return undefined;
	ip += program.width(ip);

	if (ip < program.size && program.word(ip) === OpCode.FailIfEmpty && program.word(ip + 1) === checkpoint)
		ip += 2;

	if (ip >= program.size)
		return undefined;
	const back = program.decode(ip);
	if (back.op !== OpCode.JumpNonEmpty || back.jump?.target !== fork.ip
		|| program.word(ip + 2) !== checkpoint || program.word(ip + 3) !== OpCode.Jump)
		return undefined;

	const end = back.ip + back.width;
	return fork.jump.target === end ? end : undefined;
}

export function rewriteDotStarAsSeek(program: ByteCode, _blocks: BasicBlock[], ctx: PassContext): ByteCode {
	if (ctx.flags.i)
		return program;

	// jump sources for every target, so a skeleton entered from outside is left alone
	const sources = new Map<number, number[]>();
	for (const inst of program.instructions()) {
		if (inst.jump)
			sources.set(inst.jump.target, [...(sources.get(inst.jump.target) ?? []), inst.ip]);
	}

	const edits: Edit[] = [];
	let last = 0;
	for (const inst of program.instructions()) {
		if (inst.ip < last)
			continue;
		const end = dotStarEnd(program, inst);
		if (end === undefined)
			continue;

		const entered = [...sources].some(([target, from]) => target > inst.ip && target < end && from.some(ip => ip < inst.ip || ip >= end));
		if (entered)
			continue;

		let ip = end;
		while (ip < program.size && bookkeeping.has(program.opAt(ip)))
			ip += program.width(ip);
		if (ip >= program.size || !isCompare(program.decode(ip)))
			continue;

		const code = singleCode(interpretCompares(program.compareOperands(ip), program.strings, true));
		if (code === undefined)
			continue;

		ctx.log(`.* at ${inst.ip} becomes a seek to U+${code.toString(16)}`);
		edits.push({start: inst.ip, end, replacement: [OpCode.RSeekTo, code, OpCode.ForkStay, -4]});
		last = end;
	}

	return edits.length ? applyEdits(program, edits) : program;
}

//-----------------------------------------------------------------------------
//	6. Single operand compares take the short encoding
//-----------------------------------------------------------------------------

const notSimple: ReadonlySet<CompareType> = new Set([
	CompareType.Undefined,
	CompareType.Inverse,
	CompareType.TemporaryInverse,
	CompareType.And,
	CompareType.Or,
	CompareType.EndAndOr,
	CompareType.Subtract,
]);

export function rewriteSimpleCompares(program: ByteCode, _blocks: BasicBlock[], ctx: PassContext): ByteCode {
	const simple = (inst: Instruction) => {
		if (inst.op !== OpCode.Compare)
			return undefined;
		const ops = program.compareOperands(inst.ip);
		return ops.length === 1 && !notSimple.has(ops[0].type) && program.flatCompares(inst.ip).length === 1 ? ops[0] : undefined;
	};

	let count = 0;
	for (const inst of program.instructions()) {
		if (simple(inst))
			++count;
	}
	if (!count)
		return program;

	ctx.log(`${count} compares shortened`);
	return new BytecodeRewriter(program).rewrite(inst => {
		const op = simple(inst);
		return op && compareSimpleWords(op);
	});
}

//-----------------------------------------------------------------------------
//	Metadata for the matcher's prefilter
//-----------------------------------------------------------------------------

function lowerImage(set: characterClass) {
	const result = empty().selfUnion(set);
	for (let c = 0x41; c <= 0x5a; c++) {
		if (set.test(c)) {
			result.clear(c);
			result.set(toLower(c));
		}
	}
	return result;
}

const skippedAtStart: ReadonlySet<OpCode> = new Set([
	OpCode.Checkpoint,
	OpCode.Save,
	OpCode.ClearCaptureGroup,
	OpCode.SaveLeftCaptureGroup,
]);

export function collectOptimizationData(program: ByteCode, blocks: BasicBlock[]): OptimizationData {
	const data: OptimizationData = {
		anchoredToLineStart:		false,
		startingRanges:				[],
		startingRangesInsensitive:	[],
	};
	if (!blocks.length)
		return data;

	for (const inst of blockInstructions(program, blocks[0])) {
		if (skippedAtStart.has(inst.op))
			continue;

		if (inst.op === OpCode.CheckBegin) {
			data.anchoredToLineStart = true;
			continue;
		}

		if (isCompare(inst)) {
			const ops = program.compareOperands(inst.ip);
			const interp = ops.length ? interpretCompares(ops, program.strings, true) : undefined;
			if (interp && !interp.inverse && !interp.hasReference && interp.ranges.length
				&& !interp.negatedRanges.length && !interp.classes.length && !interp.negatedClasses.length
				&& !interp.properties.length && !interp.negatedProperties.length
			) {
				const set = interp.ranges.reduce((acc: characterClass, r) => acc.selfUnion(r), empty());
				if (!set.isNegated()) {
					data.startingRanges				= set.inclusiveRanges();
					data.startingRangesInsensitive	= lowerImage(set).inclusiveRanges();
				}
			}
		}
		break;
	}
	return data;
}
