export * from './opcodes';
export * from './errors';
export * from './types';
export * from './bytecode';
export * from './compare';
export * from './rewriter';
export * from './blocks';
export * from './passes';
export * from './charclass';
export * from './alternation';
export * from './codegen';
export * from './optimizer';
export * from './vm';
export { parse, toRegExpString } from './parse';
export { Regex, parseFlags, type RegexOptions } from './regex';
