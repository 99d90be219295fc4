import { OpCode, ForkIfCondition, jumpOps } from './opcodes';
import { ByteCode, type CompareOperand } from './bytecode';
import { hasOverlap } from './compare';
import { OptimizerError } from './errors';
import type { options } from './types';

//-----------------------------------------------------------------------------
//	Alternation
//-----------------------------------------------------------------------------

// an instruction of one branch: the branch index and its address within that branch
interface Entry {
	alt:	number;
	ip:		number;
}

interface TrieNode {
	key:		string;
	children:	number[];
	entries:	Entry[];
}

export interface AlternationOptions {
	flags?:	options;
	log?:	(message: string) => void;
}

// Append code that tries each alternative in order, sharing common leading instructions where that keeps order and saves space
export function compileAlternation(target: ByteCode, alternatives: ByteCode[], opts: AlternationOptions = {}) {
	if (alternatives.length === 0)
		return;

	if (alternatives.length === 1) {
		target.append(alternatives[0]);
		return;
	}

	if (alternatives.every(a => a.size === 0))
		return;

	const trie = new AlternationTrie(target, alternatives, opts.flags ?? {});
	if (trie.worthwhile()) {
		opts.log?.(`alternation of ${alternatives.length} branches shares ${trie.sharedEntries} instructions`);
		trie.emit();
	} else {
		emitChain(target, alternatives);
	}
}

// F0..F(n-2) fork to branches 0..n-2, the last branch is the fall-through; branches are laid out last to first
export function emitChain(target: ByteCode, alternatives: ByteCode[]) {
	const n			= alternatives.length;
	const guarded	= alternatives.map((a, j) => j < n - 1 && a.size > 0 && a.words[0] === OpCode.CheckBegin);
	const header	= guarded.slice(0, n - 1).reduce((acc, g) => acc + (g ? 4 : 2), 0);

	const starts: number[] = [];
	let pos = target.size + header;
	for (let j = n - 1; j >= 0; j--) {
		starts[j] = pos;
		pos += alternatives[j].size + 2;
	}
	const end = pos;

	for (let j = 0; j < n - 1; j++) {
		const ip = target.size;
		if (guarded[j])
			target.emit(OpCode.ForkIf, starts[j] - (ip + 4), OpCode.ForkJump, ForkIfCondition.AtStartOfLine);
		else
			target.emit(OpCode.ForkJump, starts[j] - (ip + 2));
	}

	for (let j = n - 1; j >= 0; j--) {
		target.append(alternatives[j]);
		target.emit(OpCode.Jump, end - (target.size + 2));
	}
}

class AlternationTrie {
	nodes:			TrieNode[] = [{key: '', children: [], entries: []}];
	branches:		ByteCode[];
	sharedEntries	= 0;
	// per branch, instruction address to trie node
	nodeOf:			Map<number, number>[] = [];

	constructor(readonly target: ByteCode, alternatives: ByteCode[], readonly flags: options) {
		// an explicit end instruction gives every branch an address to jump to at its end
		this.branches = alternatives.map(a => a.clone().emit(OpCode.Jump, 0));

		this.branches.forEach((branch, alt) => {
			const incoming = new Map<number, string[]>();
			for (const inst of branch.instructions()) {
				if (inst.jump) {
					const list = incoming.get(inst.jump.target) ?? [];
					list.push(branch.words.slice(inst.ip, inst.ip + inst.width).join(','));
					incoming.set(inst.jump.target, list);
				}
			}

			const nodeOf = new Map<number, number>();
			let node = 0;
			for (const inst of branch.instructions()) {
				const bytes = branch.words.slice(inst.ip, inst.ip + inst.width).join(',');
				const key = `${bytes}|${(incoming.get(inst.ip) ?? []).join(';')}${jumpOps.has(inst.op) ? `#${alt}` : ''}`;
				let child = this.nodes[node].children.find(c => this.nodes[c].key === key);
				if (child === undefined) {
					child = this.nodes.push({key, children: [], entries: []}) - 1;
					this.nodes[node].children.push(child);
				} else {
					++this.sharedEntries;
				}
				this.nodes[child].entries.push({alt, ip: inst.ip});
				nodeOf.set(inst.ip, child);
				node = child;
			}
			this.nodeOf.push(nodeOf);
		});
	}

	private firstCompare(e: Entry): CompareOperand[] | undefined {
		const branch = this.branches[e.alt];
		let ip = e.ip;
		while (ip < branch.size) {
			const op = branch.opAt(ip);
			switch (op) {
				case OpCode.Checkpoint:
				case OpCode.Save:
				case OpCode.SaveLeftCaptureGroup:
				case OpCode.SaveRightCaptureGroup:
				case OpCode.SaveRightNamedCaptureGroup:
					ip += branch.width(ip);
					continue;
				case OpCode.Compare:
				case OpCode.CompareSimple:
					return branch.compareOperands(ip);
			}
			return undefined;
		}
		return undefined;
	}

	private disjoint(a: Entry[], b: Entry[]) {
		for (const x of a) {
			const cx = this.firstCompare(x);
			if (!cx)
				return false;
			for (const y of b) {
				const cy = this.firstCompare(y);
				if (!cy || hasOverlap(cx, cy, this.target.strings, this.flags))
					return false;
			}
		}
		return true;
	}

	private minAlt(id: number) {
		return Math.min(...this.nodes[id].entries.map(e => e.alt));
	}

	private orderedChildren(id: number) {
		return [...this.nodes[id].children].sort((a, b) => this.minAlt(a) - this.minAlt(b));
	}

	legal(): boolean {
		for (let id = 0; id < this.nodes.length; id++) {
			const children = this.orderedChildren(id);
			const alts = children.flatMap(c => this.nodes[c].entries.map(e => e.alt).sort((a, b) => a - b));
			if (alts.some((a, i) => i > 0 && a < alts[i - 1])) {
				for (let i = 0; i < children.length; i++) {
					for (let j = i + 1; j < children.length; j++) {
						if (!this.disjoint(this.nodes[children[i]].entries, this.nodes[children[j]].entries))
							return false;
					}
				}
			}
		}

		// a loop back into a shared prefix would rerun other branches' continuations
		for (const [alt, branch] of this.branches.entries()) {
			for (const inst of branch.instructions()) {
				if (inst.jump?.backward) {
					const node = this.nodeOf[alt].get(inst.jump.target);
					if (node === undefined || this.nodes[node].entries.length > 1)
						return false;
				}
			}
		}
		return true;
	}

	size(): number {
		let size = 0;
		for (let id = 1; id < this.nodes.length; id++) {
			const {entries, children} = this.nodes[id];
			const first = entries[0];
			size += this.branches[first.alt].width(first.ip) + 2 * children.length;
		}
		return size + 2 * this.nodes[0].children.length;
	}

	chainSize(): number {
		const n = this.branches.length;
		return this.branches.reduce((acc, b) => acc + b.size, 0) + 2 * (n - 1) + 2 * this.branches.filter((b, j) => j < n - 1 && b.words[0] === OpCode.CheckBegin).length;
	}

	worthwhile(): boolean {
		return this.sharedEntries > 0 && this.legal() && this.size() < this.chainSize();
	}

	emit() {
		const out		= this.target;
		const at		= new Map<number, number>();		// node id to output address
		const emitted	= this.branches.map(() => new Map<number, number>());
		const pending	= new Map<string, {addr: number, op: OpCode, width: number}[]>();
		const forks:	{addr: number, child: number}[] = [];
		const toEnd:	{addr: number, op: OpCode, width: number}[] = [];

		const resolve = (addr: number, op: OpCode, width: number, target: number) => {
			out.words[addr + 1] = ByteCode.offsetFor(op, addr, width, target);
		};

		const emitLinks = (id: number) => {
			const children = this.orderedChildren(id);
			children.forEach((child, i) => {
				forks.push({addr: out.size, child});
				out.emit(i < children.length - 1 ? OpCode.ForkJump : OpCode.Jump, 0);
			});
			return children;
		};

		const work = emitLinks(0);
		for (let id = work.pop(); id !== undefined; id = work.pop()) {
			const node = this.nodes[id];
			const addr = out.size;
			at.set(id, addr);

			const first	= node.entries[0];
			const src	= this.branches[first.alt];
			const inst	= src.decode(first.ip);
			out.words.push(...src.words.slice(inst.ip, inst.ip + inst.width));

			for (const e of node.entries) {
				emitted[e.alt].set(e.ip, addr);
				const key = `${e.alt}:${e.ip}`;
				for (const p of pending.get(key) ?? [])
					resolve(p.addr, p.op, p.width, addr);
				pending.delete(key);
			}

			if (inst.jump) {
				const target = inst.jump.target;
				const known = emitted[first.alt].get(target);
				if (known !== undefined) {
					resolve(addr, inst.op, inst.width, known);
				} else if (target >= src.size) {
					toEnd.push({addr, op: inst.op, width: inst.width});
				} else if (target > inst.ip) {
					const key = `${first.alt}:${target}`;
					pending.set(key, [...(pending.get(key) ?? []), {addr, op: inst.op, width: inst.width}]);
				} else {
					throw new OptimizerError(`backward jump at ${inst.ip} in branch ${first.alt} targets ${target}, which was not laid out`, src.disassemble());
				}
			}

			work.push(...emitLinks(id));
		}

		if (pending.size)
			throw new OptimizerError(`unresolved jumps in alternation: ${[...pending.keys()].join(' ')}`);

		for (const {addr, child} of forks) {
			const target = at.get(child);
			if (target === undefined)
				throw new OptimizerError(`alternation node ${child} was never laid out`);
			out.words[addr + 1] = target - (addr + 2);
		}

		const end = out.size;
		for (const p of toEnd)
			resolve(p.addr, p.op, p.width, end);
	}
}
