import { ByteCode } from './bytecode';
import { splitBasicBlocks, splitBlocksForAtomicGroups, type BasicBlock } from './blocks';
import {
	dropUselessJumps, substringSearch, rewriteLoopsAsAtomic, mergeAdjacentCompares,
	rewriteDotStarAsSeek, rewriteSimpleCompares, collectOptimizationData,
	type OptimizationData, type PassContext,
} from './passes';
import type { options } from './types';

//-----------------------------------------------------------------------------
//	Optimizer driver
//-----------------------------------------------------------------------------

export const PassName = {
	dropUselessJumps:	'dropUselessJumps',
	substringSearch:	'substringSearch',
	atomicLoops:		'atomicLoops',
	mergeCompares:		'mergeCompares',
	seekDotStar:		'seekDotStar',
	simpleCompares:		'simpleCompares',
} as const;

export type PassName = (typeof PassName)[keyof typeof PassName];

export interface OptimizerOptions {
	flags?:		options;
	// passes switched off with false; all run by default
	passes?:	Partial<Record<PassName, boolean>>;
	log?:		(message: string) => void;
	// print the program after every pass
	debug?:		boolean;
}

export interface OptimizedProgram {
	program:	ByteCode;
	data:		OptimizationData;
}

type Rewrite = (program: ByteCode, blocks: BasicBlock[], ctx: PassContext) => ByteCode;

const rewrites: [PassName, (program: ByteCode) => BasicBlock[], Rewrite][] = [
	[PassName.atomicLoops,		splitBlocksForAtomicGroups,	rewriteLoopsAsAtomic],
	[PassName.mergeCompares,	splitBasicBlocks,			mergeAdjacentCompares],
	[PassName.seekDotStar,		splitBasicBlocks,			rewriteDotStarAsSeek],
	[PassName.simpleCompares,	splitBasicBlocks,			rewriteSimpleCompares],
];

// The input program is left untouched
export function optimize(input: ByteCode, opts: OptimizerOptions = {}): OptimizedProgram {
	const enabled	= (name: PassName) => opts.passes?.[name] !== false;
	const log		= opts.log ?? (opts.debug ? (message: string) => console.log(message) : () => {});
	const ctx: PassContext = {flags: opts.flags ?? {}, log};

	const dump = (name: string, program: ByteCode) => {
		if (opts.debug)
			console.log(`after ${name}:\n${program.disassemble()}`);
	};

	let program = input.clone();

	if (enabled(PassName.dropUselessJumps)) {
		program = dropUselessJumps(program, ctx);
		dump(PassName.dropUselessJumps, program);
	}

	if (enabled(PassName.substringSearch)) {
		const substring = substringSearch(program, splitBasicBlocks(program), ctx);
		if (substring) {
			const data = collectOptimizationData(program, splitBasicBlocks(program));
			return {program, data: {...data, substring}};
		}
	}

	for (const [name, blocks, rewrite] of rewrites) {
		if (!enabled(name))
			continue;
		program = rewrite(program, blocks(program), ctx);
		dump(name, program);
	}

	return {program, data: collectOptimizationData(program, splitBasicBlocks(program))};
}
