//-----------------------------------------------------------------------------
//	Opcodes
//-----------------------------------------------------------------------------

export const OpCode = {
	Compare						: 0,
	Jump						: 1,
	JumpNonEmpty				: 2,
	ForkJump					: 3,
	ForkStay					: 4,
	ForkReplaceJump				: 5,
	ForkReplaceStay				: 6,
	ForkIf						: 7,
	FailForks					: 8,
	PopSaved					: 9,
	SaveLeftCaptureGroup		: 10,
	SaveRightCaptureGroup		: 11,
	SaveRightNamedCaptureGroup	: 12,
	RSeekTo						: 13,
	CheckBegin					: 14,
	CheckEnd					: 15,
	CheckBoundary				: 16,
	Save						: 17,
	Restore						: 18,
	GoBack						: 19,
	SetStepBack					: 20,
	IncStepBack					: 21,
	CheckStepBack				: 22,
	CheckSavedPosition			: 23,
	ClearCaptureGroup			: 24,
	Repeat						: 25,
	ResetRepeat					: 26,
	Checkpoint					: 27,
	CompareSimple				: 28,
	Exit						: 29,
	FailIfEmpty					: 30,
} as const;

export type OpCode = (typeof OpCode)[keyof typeof OpCode];

export const opCodeNames: Record<number, string> = Object.fromEntries(Object.entries(OpCode).map(([k, v]) => [v, k]));

export function isOpCode(n: number): n is OpCode {
	return Number.isInteger(n) && n in opCodeNames;
}

// words taken by each opcode with a fixed width; Compare and CompareSimple carry their own size
const fixedWidths: Partial<Record<OpCode, number>> = {
	[OpCode.Exit]:						1,
	[OpCode.FailForks]:					1,
	[OpCode.PopSaved]:					1,
	[OpCode.Save]:						1,
	[OpCode.Restore]:					1,
	[OpCode.IncStepBack]:				1,
	[OpCode.CheckStepBack]:				1,
	[OpCode.CheckSavedPosition]:		1,
	[OpCode.CheckBegin]:				1,
	[OpCode.CheckEnd]:					1,
	[OpCode.Jump]:						2,
	[OpCode.ForkJump]:					2,
	[OpCode.ForkStay]:					2,
	[OpCode.ForkReplaceJump]:			2,
	[OpCode.ForkReplaceStay]:			2,
	[OpCode.GoBack]:					2,
	[OpCode.SetStepBack]:				2,
	[OpCode.CheckBoundary]:				2,
	[OpCode.ClearCaptureGroup]:			2,
	[OpCode.SaveLeftCaptureGroup]:		2,
	[OpCode.SaveRightCaptureGroup]:		2,
	[OpCode.RSeekTo]:					2,
	[OpCode.ResetRepeat]:				2,
	[OpCode.Checkpoint]:				2,
	[OpCode.FailIfEmpty]:				2,
	[OpCode.SaveRightNamedCaptureGroup]:3,
	[OpCode.Repeat]:					4,
	[OpCode.JumpNonEmpty]:				4,
	[OpCode.ForkIf]:					4,
};

export function fixedWidth(op: OpCode): number | undefined {
	return fixedWidths[op];
}

export const jumpOps: ReadonlySet<OpCode> = new Set([
	OpCode.Jump,
	OpCode.JumpNonEmpty,
	OpCode.ForkJump,
	OpCode.ForkStay,
	OpCode.ForkReplaceJump,
	OpCode.ForkReplaceStay,
	OpCode.ForkIf,
	OpCode.Repeat,
]);

export const forkOps: ReadonlySet<OpCode> = new Set([
	OpCode.ForkJump,
	OpCode.ForkStay,
	OpCode.ForkReplaceJump,
	OpCode.ForkReplaceStay,
	OpCode.ForkIf,
]);

//-----------------------------------------------------------------------------
//	Compare operand types
//-----------------------------------------------------------------------------

export const CompareType = {
	Undefined			: 0,
	Inverse				: 1,
	TemporaryInverse	: 2,
	AnyChar				: 3,
	Char				: 4,
	String				: 5,
	CharClass			: 6,
	CharRange			: 7,
	Reference			: 8,
	NamedReference		: 9,
	Property			: 10,
	GeneralCategory		: 11,
	Script				: 12,
	ScriptExtension		: 13,
	LookupTable			: 14,
	And					: 15,
	Or					: 16,
	EndAndOr			: 17,
	Subtract			: 18,
	StringSet			: 19,
} as const;

export type CompareType = (typeof CompareType)[keyof typeof CompareType];

export const compareTypeNames: Record<number, string> = Object.fromEntries(Object.entries(CompareType).map(([k, v]) => [v, k]));

export function isCompareType(n: number): n is CompareType {
	return Number.isInteger(n) && n in compareTypeNames;
}

// operand types that take no value word
export const valuelessTypes: ReadonlySet<CompareType> = new Set([
	CompareType.Inverse,
	CompareType.TemporaryInverse,
	CompareType.AnyChar,
	CompareType.And,
	CompareType.Or,
	CompareType.EndAndOr,
	CompareType.Subtract,
]);

export const propertyTypes: ReadonlySet<CompareType> = new Set([
	CompareType.Property,
	CompareType.GeneralCategory,
	CompareType.Script,
	CompareType.ScriptExtension,
]);

//-----------------------------------------------------------------------------
//	Operand values
//-----------------------------------------------------------------------------

export const CharClass = {
	Alnum	: 0,
	Cntrl	: 1,
	Lower	: 2,
	Space	: 3,
	Alpha	: 4,
	Digit	: 5,
	Print	: 6,
	Upper	: 7,
	Blank	: 8,
	Graph	: 9,
	Punct	: 10,
	Word	: 11,
	Xdigit	: 12,
} as const;

export type CharClass = (typeof CharClass)[keyof typeof CharClass];

export const charClassNames: Record<number, string> = Object.fromEntries(Object.entries(CharClass).map(([k, v]) => [v, k]));

export function isCharClass(n: number): n is CharClass {
	return Number.isInteger(n) && n in charClassNames;
}

export const BoundaryCheckType = {
	Word	: 0,
	NonWord	: 1,
} as const;

export type BoundaryCheckType = (typeof BoundaryCheckType)[keyof typeof BoundaryCheckType];

export const ForkIfCondition = {
	AtStartOfLine	: 0,
} as const;

export type ForkIfCondition = (typeof ForkIfCondition)[keyof typeof ForkIfCondition];
