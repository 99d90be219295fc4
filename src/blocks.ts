import { ByteCode } from './bytecode';
import { OpCode } from './opcodes';
import { OptimizerError } from './errors';

//-----------------------------------------------------------------------------
//	Basic blocks
//-----------------------------------------------------------------------------

// `end` is the address of the block's last instruction
export interface BasicBlock {
	start:		number;
	end:		number;
	comment?:	string;
}

// Every jump or fork contributes its target and its fall-through; FailForks ends a block too
export function splitBasicBlocks(program: ByteCode): BasicBlock[] {
	if (program.size === 0)
		return [];

	const starts	= program.boundaries();
	const valid		= new Set(starts);
	const cuts		= new Set<number>([0]);

	for (const inst of program.instructions()) {
		const next = inst.ip + inst.width;
		if (inst.jump) {
			const target = inst.jump.target;
			if (!valid.has(target))
				throw new OptimizerError(`jump at ${inst.ip} lands inside an instruction at ${target}`, program.disassemble());
			cuts.add(target);
			cuts.add(next);
		} else if (inst.op === OpCode.FailForks) {
			cuts.add(next);
		}
	}

	const sorted	= [...cuts].filter(c => c < program.size).sort((a, b) => a - b);
	const last		= (end: number) => {
		// address of the final instruction before `end`
		const i = starts.indexOf(end);
		return starts[i - 1];
	};

	return sorted.map((start, i) => ({start, end: last(sorted[i + 1] ?? program.size)}));
}

// Block layout used to find loops: a backward jump into the open span splits it into a head and a loop body; the closing block is half-open and ends at the program size
export function splitBlocksForAtomicGroups(program: ByteCode): BasicBlock[] {
	const blocks: BasicBlock[] = [];
	let endOfLast = 0;

	for (const inst of program.instructions()) {
		const {ip, op, width} = inst;
		switch (op) {
			case OpCode.Jump:
			case OpCode.JumpNonEmpty:
			case OpCode.ForkJump:
			case OpCode.ForkStay:
			case OpCode.ForkIf: {
				const target = inst.jump?.target ?? ip + width;
				if (target >= ip) {
					blocks.push({start: endOfLast, end: ip, comment: 'Jump ahead'});
				} else if (target > endOfLast) {
					blocks.push({start: endOfLast, end: target, comment: 'Jump back 1'});
					blocks.push({start: target, end: ip, comment: 'Jump back 2'});
				} else {
					blocks.push({start: endOfLast, end: ip, comment: 'Jump'});
				}
				endOfLast = ip + width;
				break;
			}
			case OpCode.FailForks:
				blocks.push({start: endOfLast, end: ip, comment: 'FailForks'});
				endOfLast = ip + width;
				break;

			case OpCode.Repeat: {
				const start = inst.jump?.target ?? ip;
				if (start > endOfLast)
					blocks.push({start: endOfLast, end: start, comment: 'Repeat'});
				blocks.push({start, end: ip, comment: 'Repeat after'});
				endOfLast = ip + width;
				break;
			}
		}
	}

	if (endOfLast < program.size)
		blocks.push({start: endOfLast, end: program.size, comment: 'End'});

	return blocks.sort((a, b) => a.start - b.start);
}
