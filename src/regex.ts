import { parse, toRegExpString } from './parse';
import { buildByteCode } from './codegen';
import { optimize, type OptimizerOptions, type OptimizedProgram } from './optimizer';
import { execute, type MatchResult } from './vm';
import type { ByteCode } from './bytecode';
import type { options, part } from './types';

//-----------------------------------------------------------------------------
//	Compiled pattern
//-----------------------------------------------------------------------------

export interface RegexOptions extends options {
	optimizer?:	Omit<OptimizerOptions, 'flags'>;
	stepLimit?:	number;
}

export function parseFlags(flags: string): options {
	const result: options = {};
	for (const f of flags) {
		if (f !== 'i' && f !== 'm' && f !== 's')
			throw new Error(`Unsupported flag '${f}'`);
		result[f] = true;
	}
	return result;
}

export class Regex {
	readonly unoptimized:	ByteCode;
	readonly optimized:		OptimizedProgram;
	readonly flags:			options;

	constructor(readonly part: part, readonly options: RegexOptions = {}) {
		const {i, m, s} = options;
		this.flags			= {i, m, s};
		this.unoptimized	= buildByteCode(part, {flags: this.flags, log: options.optimizer?.log});
		this.optimized		= optimize(this.unoptimized, {...options.optimizer, flags: this.flags});
	}

	get program()	{ return this.optimized.program; }
	get data()		{ return this.optimized.data; }
	get source()	{ return toRegExpString(this.part); }

	exec(str: string, from = 0): MatchResult | undefined {
		return execute(this.program, str, from, {flags: this.flags, data: this.data, stepLimit: this.options.stepLimit});
	}

	test(str: string) {
		return !!this.exec(str);
	}

	// group index (and name) to captured text, like the NFA runner's result
	run(str: string) {
		const m = this.exec(str);
		if (m) {
			const result: Record<number | string, string | undefined> = {...m.groups};
			m.captures.forEach((c, id) => result[id] = c);
			return result;
		}
	}

	disassemble() {
		return this.program.disassemble();
	}

	static fromParts(parts: part, options: RegexOptions = {}) {
		return new this(parts, options);
	}

	static fromString(str: string, options: RegexOptions | string = {}) {
		return this.fromParts(parse(str), typeof options === 'string' ? parseFlags(options) : options);
	}
}
