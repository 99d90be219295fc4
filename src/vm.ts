import { OpCode, CompareType, BoundaryCheckType, ForkIfCondition, isCharClass, isOpCode } from './opcodes';
import { ByteCode, type CompareOperand } from './bytecode';
import { propertyKinds, testClass, testProperty } from './compare';
import type { OptimizationData } from './passes';
import type { options } from './types';
import { isLineTerminator, isWordChar, swapCase, toLower } from './unicode';
import { MatchLimitError, OptimizerError } from './errors';

//-----------------------------------------------------------------------------
//	Backtracking matcher
//-----------------------------------------------------------------------------

export type Span = [start: number, end: number];

export interface MatchResult {
	index:		number;
	end:		number;
	// group 0 is the whole match; positions count code points
	spans:		(Span | undefined)[];
	captures:	(string | undefined)[];
	groups:		Record<string, string | undefined>;
}

export interface MatchOptions {
	flags?:		options;
	data?:		OptimizationData;
	stepLimit?:	number;
}

export const defaultStepLimit = 1_000_000;

interface Saved {
	pos:	number;
	height:	number;		// backtrack stack height when saved
}

interface Thread {
	ip:				number;
	pos:			number;
	lefts:			number[];
	captures:		(Span | undefined)[];
	checkpoints:	number[];
	looped:			boolean[];	// per checkpoint, whether the current pass is past the loop's first iteration
	repeats:		number[];
	saved:			Saved[];
	stepBacks:		number[];
	seekStart?:		number;
	fork?:			number;		// address of the fork that pushed this thread
}

function copy(t: Thread): Thread {
	return {
		...t,
		lefts:			[...t.lefts],
		captures:		[...t.captures],
		checkpoints:	[...t.checkpoints],
		looped:			[...t.looped],
		repeats:		[...t.repeats],
		saved:			[...t.saved],
		stepBacks:		[...t.stepBacks],
	};
}

function toCodePoints(text: string): number[] {
	const result: number[] = [];
	for (const c of text)
		result.push(c.codePointAt(0) ?? 0);
	return result;
}

//-----------------------------------------------------------------------------
//	Compare evaluation
//-----------------------------------------------------------------------------

type CompareNode =
	| {kind: 'item', op: CompareOperand, negated: boolean}
	| {kind: 'group', type: CompareType, members: CompareNode[], negated: boolean};

interface CompareTree {
	inverse:	boolean;
	members:	CompareNode[];
}

function compareTree(ops: CompareOperand[]): CompareTree {
	const root: CompareNode[] = [];
	const stack: CompareNode[][] = [root];
	const open: CompareNode[] = [];
	let inverse		= false;
	let temporary	= false;

	for (const op of ops) {
		const top = stack[stack.length - 1];
		switch (op.type) {
			case CompareType.Inverse:
				inverse = !inverse;
				break;
			case CompareType.TemporaryInverse:
				temporary = !temporary;
				break;
			case CompareType.Or:
			case CompareType.And:
			case CompareType.Subtract: {
				const group: CompareNode = {kind: 'group', type: op.type, members: [], negated: temporary};
				top.push(group);
				open.push(group);
				stack.push(group.members);
				temporary = false;
				break;
			}
			case CompareType.EndAndOr:
				if (!open.pop())
					throw new OptimizerError('EndAndOr without an open group');
				stack.pop();
				break;
			default:
				top.push({kind: 'item', op, negated: temporary});
				temporary = false;
				break;
		}
	}
	return {inverse, members: root};
}

class Matcher {
	readonly input:		number[];
	readonly flags:		options;
	readonly names		= new Map<string, number[]>();
	readonly groupCount:number;

	constructor(readonly program: ByteCode, text: string, flags: options, readonly stepLimit: number) {
		this.input = toCodePoints(text);
		this.flags = flags;
		let count = 0;
		for (const inst of program.instructions()) {
			if (inst.op === OpCode.SaveLeftCaptureGroup)
				count = Math.max(count, program.word(inst.ip + 1));
			if (inst.op === OpCode.SaveRightNamedCaptureGroup) {
				const name	= program.strings.string(program.word(inst.ip + 1));
				const id	= program.word(inst.ip + 2);
				this.names.set(name, [...(this.names.get(name) ?? []), id]);
			}
		}
		this.groupCount = count;
	}

	//-------------------------------------------------------------------------
	//	Predicates
	//-------------------------------------------------------------------------

	atLineStart(pos: number) {
		return pos === 0 || (!!this.flags.m && isLineTerminator(this.input[pos - 1]));
	}

	atLineEnd(pos: number) {
		return pos === this.input.length || (!!this.flags.m && isLineTerminator(this.input[pos]));
	}

	atWordBoundary(pos: number) {
		const before	= pos > 0 && isWordChar(this.input[pos - 1]);
		const after		= pos < this.input.length && isWordChar(this.input[pos]);
		return before !== after;
	}

	sameCode(a: number, b: number) {
		return a === b || (!!this.flags.i && toLower(a) === toLower(b));
	}

	matchText(codes: number[], pos: number): number | undefined {
		if (pos + codes.length > this.input.length)
			return undefined;
		return codes.every((c, k) => this.sameCode(this.input[pos + k], c)) ? codes.length : undefined;
	}

	captureText(t: Thread, id: number): number[] | undefined {
		const span = t.captures[id];
		return span && this.input.slice(span[0], span[1]);
	}

	// match lengths of one operand at `pos`
	itemLengths(op: CompareOperand, t: Thread, pos: number): number[] {
		const code	= this.input[pos];
		const has	= pos < this.input.length;
		const i		= !!this.flags.i;
		// the test only runs when there is a character to test
		const yes	= (test: () => boolean) => has && test() ? [1] : [];
		const strings = this.program.strings;

		switch (op.type) {
			case CompareType.AnyChar:
				return yes(() => !!this.flags.s || !isLineTerminator(code));

			case CompareType.Char:
				return yes(() => this.sameCode(code, op.value));

			case CompareType.CharRange: {
				const to = op.to ?? op.value;
				return yes(() => (code >= op.value && code <= to) || (i && swapCase(code) >= op.value && swapCase(code) <= to));
			}

			case CompareType.LookupTable: {
				const table = op.table;
				if (!table)
					return [];
				const inRanges = (list: [number, number][], c: number) => list.some(([from, to]) => c >= from && c <= to);
				if (i && table.insensitive.length)
					return yes(() => inRanges(table.insensitive, code));
				return yes(() => inRanges(table.sensitive, code) || (i && inRanges(table.sensitive, swapCase(code))));
			}

			case CompareType.CharClass: {
				const name = op.value;
				if (!isCharClass(name))
					throw new OptimizerError(`unknown character class ${name}`);
				return yes(() => testClass(name, code, i));
			}

			case CompareType.Property:
			case CompareType.GeneralCategory:
			case CompareType.Script:
			case CompareType.ScriptExtension: {
				const kind = propertyKinds[op.type];
				if (!kind)
					return [];
				return yes(() => testProperty({kind, name: strings.string(op.value)}, code, i));
			}

			case CompareType.String: {
				const n = this.matchText(toCodePoints(strings.string(op.value)), pos);
				return n === undefined ? [] : [n];
			}

			case CompareType.StringSet:
				return strings.set(op.value).flatMap(s => {
					const n = this.matchText(toCodePoints(s), pos);
					return n === undefined ? [] : [n];
				});

			case CompareType.Reference:
			case CompareType.NamedReference: {
				const ids = op.type === CompareType.Reference
					? [op.value]
					: this.names.get(strings.string(op.value)) ?? [];
				const text = ids.map(id => this.captureText(t, id)).find(c => c !== undefined);
				if (!text)
					return [0];
				const n = this.matchText(text, pos);
				return n === undefined ? [] : [n];
			}

			default:
				throw new OptimizerError(`compare operand ${op.type} cannot be evaluated on its own`);
		}
	}

	nodeLengths(node: CompareNode, t: Thread, pos: number): number[] {
		let lengths: number[];
		if (node.kind === 'item') {
			lengths = this.itemLengths(node.op, t, pos);
		} else {
			const members = node.members.map(m => this.nodeLengths(m, t, pos));
			switch (node.type) {
				case CompareType.And:
					lengths = members.length ? members.reduce((acc, m) => acc.filter(n => m.includes(n))) : [];
					break;
				case CompareType.Subtract:
					lengths = members.length ? members[0].filter(n => !members.slice(1).some(m => m.includes(n))) : [];
					break;
				default:
					lengths = members.flat();
					break;
			}
		}
		if (node.negated)
			return pos < this.input.length && !lengths.includes(1) ? [1] : [];
		return lengths;
	}

	// characters consumed, or undefined when the compare fails
	compare(ops: CompareOperand[], t: Thread): number | undefined {
		const tree		= compareTree(ops);
		const lengths	= tree.members.flatMap(m => this.nodeLengths(m, t, t.pos));
		if (tree.inverse)
			return t.pos < this.input.length && !lengths.includes(1) ? 1 : undefined;
		return lengths.length ? Math.max(...lengths) : undefined;
	}

	//-------------------------------------------------------------------------
	//	Execution
	//-------------------------------------------------------------------------

	run(start: number, budget: {steps: number}): Thread | undefined {
		const program	= this.program;
		const input		= this.input;
		const stack:	Thread[] = [];
		let t: Thread = {ip: 0, pos: start, lefts: [], captures: [], checkpoints: [], looped: [], repeats: [], saved: [], stepBacks: []};

		const fork = (target: number, form: number, width: number) => {
			const stay		= form === OpCode.ForkStay || form === OpCode.ForkReplaceStay;
			const replace	= form === OpCode.ForkReplaceJump || form === OpCode.ForkReplaceStay;
			const resume	= copy(t);
			resume.ip	= stay ? target : t.ip + width;
			resume.fork	= t.ip;

			let replaced = false;
			if (replace) {
				for (let k = stack.length - 1; k >= 0; k--) {
					if (stack[k].fork === t.ip) {
						stack[k] = resume;
						replaced = true;
						break;
					}
				}
			}
			if (!replaced)
				stack.push(resume);

			if (stay) {
				t.ip		= t.ip + width;
				t.seekStart	= undefined;
			} else {
				t.ip = target;
			}
			return resume;
		};

		for (;;) {
			if (++budget.steps > this.stepLimit)
				throw new MatchLimitError(this.stepLimit);

			if (t.ip >= program.size)
				return t;

			const inst	= program.decode(t.ip);
			const next	= t.ip + inst.width;
			const arg	= (k: number) => program.word(t.ip + k);
			let ok		= true;

			switch (inst.op) {
				case OpCode.Exit:
					return t;

				case OpCode.Compare:
				case OpCode.CompareSimple: {
					const n = this.compare(program.compareOperands(t.ip), t);
					if (n === undefined) {
						ok = false;
					} else {
						t.pos += n;
						t.ip = next;
					}
					break;
				}

				case OpCode.Jump:
					t.ip = inst.jump?.target ?? next;
					break;

				case OpCode.ForkJump:
				case OpCode.ForkStay:
				case OpCode.ForkReplaceJump:
				case OpCode.ForkReplaceStay:
					fork(inst.jump?.target ?? next, inst.op, inst.width);
					break;

				case OpCode.JumpNonEmpty: {
					const id			= arg(2);
					const checkpoint	= t.checkpoints[id] ?? 0;
					const form			= arg(3);
					if (checkpoint !== 0 && checkpoint !== t.pos + 1) {
						if (form === OpCode.Jump) {
							t.ip = inst.jump?.target ?? next;
						} else {
							// the copy that leaves the loop starts afresh if the loop is entered again
							t.looped[id] = true;
							const resume = fork(inst.jump?.target ?? next, form, inst.width);
							(resume.ip === next ? resume : t).looped[id] = false;
						}
					} else if (form === OpCode.Jump || t.looped[id]) {
						// an empty optional iteration fails, leaving the state from before it
						ok = false;
					} else {
						t.ip = next;
					}
					break;
				}

				case OpCode.ForkIf: {
					const form = arg(2);
					if (!isOpCode(form))
						throw new OptimizerError(`bad fork form ${form} at ${t.ip}`);
					if (arg(3) === ForkIfCondition.AtStartOfLine && this.atLineStart(t.pos))
						fork(inst.jump?.target ?? next, form, inst.width);
					else if (form === OpCode.ForkStay || form === OpCode.ForkReplaceStay)
						t.ip = inst.jump?.target ?? next;
					else
						t.ip = next;
					break;
				}

				case OpCode.FailForks: {
					const save = t.saved[t.saved.length - 1];
					if (save)
						stack.length = Math.min(stack.length, save.height);
					ok = false;
					break;
				}

				case OpCode.PopSaved:
					t.saved.pop();
					ok = false;
					break;

				case OpCode.SaveLeftCaptureGroup:
					t.lefts[arg(1)] = t.pos;
					t.ip = next;
					break;

				case OpCode.SaveRightCaptureGroup:
				case OpCode.SaveRightNamedCaptureGroup: {
					const id	= inst.op === OpCode.SaveRightCaptureGroup ? arg(1) : arg(2);
					const left	= t.lefts[id] ?? t.pos;
					if (t.pos < left) {
						ok = false;
					} else {
						t.captures[id] = [left, t.pos];
						t.ip = next;
					}
					break;
				}

				case OpCode.ClearCaptureGroup:
					t.captures[arg(1)] = undefined;
					t.ip = next;
					break;

				case OpCode.RSeekTo: {
					const target = arg(1);
					let found = -1;
					if (t.seekStart === undefined) {
						t.seekStart = t.pos;
						let limit = input.length - 1;
						if (!this.flags.s) {
							limit = t.pos;
							while (limit < input.length && !isLineTerminator(input[limit]))
								++limit;
						}
						for (let k = Math.min(limit, input.length - 1); k >= t.pos; k--) {
							if (input[k] === target) {
								found = k;
								break;
							}
						}
					} else {
						for (let k = t.pos - 1; k >= t.seekStart; k--) {
							if (input[k] === target) {
								found = k;
								break;
							}
						}
					}
					if (found < 0) {
						ok = false;
					} else {
						t.pos = found;
						t.ip = next;
					}
					break;
				}

				case OpCode.CheckBegin:
					ok = this.atLineStart(t.pos);
					t.ip = next;
					break;

				case OpCode.CheckEnd:
					ok = this.atLineEnd(t.pos);
					t.ip = next;
					break;

				case OpCode.CheckBoundary:
					ok = this.atWordBoundary(t.pos) === (arg(1) === BoundaryCheckType.Word);
					t.ip = next;
					break;

				case OpCode.Save:
					t.saved.push({pos: t.pos, height: stack.length});
					t.ip = next;
					break;

				case OpCode.Restore: {
					const save = t.saved.pop();
					if (save) {
						t.pos = save.pos;
						t.ip = next;
					} else {
						ok = false;
					}
					break;
				}

				case OpCode.GoBack:
					if (arg(1) > t.pos) {
						ok = false;
					} else {
						t.pos -= arg(1);
						t.ip = next;
					}
					break;

				case OpCode.SetStepBack:
					t.stepBacks.push(arg(1));
					t.ip = next;
					break;

				case OpCode.IncStepBack: {
					const last = t.stepBacks.length - 1;
					if (last < 0) {
						ok = false;
						break;
					}
					const step = ++t.stepBacks[last];
					if (step > t.pos) {
						ok = false;
					} else {
						t.pos -= step;
						t.ip = next;
					}
					break;
				}

				case OpCode.CheckStepBack: {
					const step = t.stepBacks[t.stepBacks.length - 1];
					const save = t.saved[t.saved.length - 1];
					if (step === undefined || !save || step > save.pos) {
						ok = false;
					} else {
						t.pos = save.pos;
						t.ip = next;
					}
					break;
				}

				case OpCode.CheckSavedPosition: {
					const save = t.saved[t.saved.length - 1];
					if (!save || save.pos !== t.pos) {
						ok = false;
					} else {
						t.stepBacks.pop();
						t.ip = next;
					}
					break;
				}

				case OpCode.Repeat: {
					const id	= arg(3);
					const count	= arg(2);
					const rep	= t.repeats[id] ?? 0;
					if (rep === count - 1) {
						t.repeats[id] = 0;
						t.ip = next;
					} else {
						t.repeats[id] = rep + 1;
						t.ip = inst.jump?.target ?? next;
					}
					break;
				}

				case OpCode.ResetRepeat:
					t.repeats[arg(1)] = 0;
					t.ip = next;
					break;

				case OpCode.Checkpoint:
					t.checkpoints[arg(1)] = t.pos + 1;
					t.ip = next;
					break;

				case OpCode.FailIfEmpty:
					ok = (t.checkpoints[arg(1)] ?? 0) !== t.pos + 1;
					t.ip = next;
					break;
			}

			if (!ok) {
				const resume = stack.pop();
				if (!resume)
					return undefined;
				t = resume;
			}
		}
	}

	result(start: number, t: Thread): MatchResult {
		const spans: (Span | undefined)[] = [[start, t.pos]];
		for (let id = 1; id <= this.groupCount; id++)
			spans.push(t.captures[id]);

		const text		= (span: Span | undefined) => span && String.fromCodePoint(...this.input.slice(span[0], span[1]));
		const captures	= spans.map(text);
		const groups: Record<string, string | undefined> = {};
		for (const [name, ids] of this.names)
			groups[name] = ids.map(id => captures[id]).find(c => c !== undefined);

		return {index: start, end: t.pos, spans, captures, groups};
	}

	//-------------------------------------------------------------------------
	//	Search
	//-------------------------------------------------------------------------

	// quick rejection of start positions using the optimizer's metadata
	worthTrying(pos: number, data: OptimizationData) {
		if (data.anchoredToLineStart && !this.atLineStart(pos))
			return false;
		if (data.startingRanges.length) {
			if (pos >= this.input.length)
				return false;
			const code	= this.input[pos];
			const ranges= this.flags.i ? data.startingRangesInsensitive : data.startingRanges;
			const folded	= this.flags.i ? toLower(code) : code;
			return ranges.some(([from, to]) => folded >= from && folded <= to);
		}
		return true;
	}

	search(from: number, data?: OptimizationData): MatchResult | undefined {
		const budget = {steps: 0};

		if (data?.substring) {
			const needle = toCodePoints(String.fromCharCode(...data.substring));
			for (let pos = from; pos + needle.length <= this.input.length; pos++) {
				if (this.matchText(needle, pos) !== undefined)
					return this.result(pos, {ip: 0, pos: pos + needle.length, lefts: [], captures: [], checkpoints: [], looped: [], repeats: [], saved: [], stepBacks: []});
			}
			return undefined;
		}

		for (let pos = from; pos <= this.input.length; pos++) {
			if (data && !this.worthTrying(pos, data))
				continue;
			const t = this.run(pos, budget);
			if (t)
				return this.result(pos, t);
		}
		return undefined;
	}
}

// Find the first match at or after `from` (a code point index)
export function execute(program: ByteCode, text: string, from = 0, opts: MatchOptions = {}): MatchResult | undefined {
	return new Matcher(program, text, opts.flags ?? {}, opts.stepLimit ?? defaultStepLimit).search(from, opts.data);
}

// Match only at `start`
export function matchAt(program: ByteCode, text: string, start = 0, opts: MatchOptions = {}): MatchResult | undefined {
	const matcher = new Matcher(program, text, opts.flags ?? {}, opts.stepLimit ?? defaultStepLimit);
	const t = matcher.run(start, {steps: 0});
	return t && matcher.result(start, t);
}
