// Raised when a pass meets bytecode it cannot make sense of; carries a listing of the program when one is available
export class OptimizerError extends Error {
	constructor(message: string, public readonly listing?: string) {
		super(listing ? `${message}\n${listing}` : message);
		this.name = 'OptimizerError';
	}
}

export class ParseError extends Error {
	constructor(message: string, public readonly pattern: string, public readonly offset: number) {
		super(`${message} at ${offset} in /${pattern}/`);
		this.name = 'ParseError';
	}
}

// A pattern that parses but has no bytecode form
export class CodegenError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'CodegenError';
	}
}

export class MatchLimitError extends Error {
	constructor(public readonly steps: number) {
		super(`match exceeded ${steps} steps`);
		this.name = 'MatchLimitError';
	}
}
