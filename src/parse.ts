import {
	alternation,
	noncapture,
	capture,
	type part,
	any,
	wordBoundary,
	nonWordBoundary,
	startAnchor,
	endAnchor,
	concatenation,
	repeatFrom,
	builtin,
	property,
	set,
	type setItem,
	is,
	type,
	type quantifiedMod,
	escapeText,
} from "./types";
import { CharClass } from "./opcodes";
import { classifyProperty, propertyValue } from "./unicode";
import { ParseError } from "./errors";

/*
Supported syntax

[xyz],[a-c]		Character class
[^xyz],[^a-c]	Negated character class
.			Any character except line terminators (unless s)
\d \D \w \W \s \S	Class escapes, also inside brackets
\t \r \n \v \f [\b] \0 \cX \xhh \uhhhh \u{hhhhh}
\p{Property}, \P{Property}, \p{gc=Lu}, \p{sc=Greek}, \p{scx=Greek}

x|y			Alternation
^ $ \b \B	Assertions
(?=y) (?!y) (?<=y) (?<!y)	Lookaround
(x) (?<Name>x) (?:x)		Groups
\<int> \k<Name>				Backreferences
* + ? {n} {n,} {n,m}		Quantifiers, with a trailing ? for lazy
*/

//-----------------------------------------------------------------------------
// Regex parsing
//-----------------------------------------------------------------------------

interface PendingGroup {
	type: 'group';
	group: capture | noncapture;
	tos: part[];
}

interface PendingAlt {
	type: 'alt';
	parts: part[];
}

type escape = number | builtin | property;

const assertions = new Set(['wordbound', 'nowordbound', 'inputboundstart', 'inputboundend']);

export function parse(re: string): part {
	const stack:	(PendingAlt | PendingGroup)[] = [];
	let curr:		part[] = [];
	let i	= 0;

	function fail(message: string, at = i): never {
		throw new ParseError(message, re, at);
	}

	function check(c: string) {
		if (re.startsWith(c, i)) {
			i += c.length;
			return true;
		}
		return false;
	}

	function skipTo(c: string) {
		const start = i;
		while (i < re.length && re[i] !== c)
			i++;
		if (re[i] !== c)
			fail(`Missing '${c}'`, start);
		return re.substring(start, i++);
	}

	function int(): number {
		const start = i;
		while (re[i] >= '0' && re[i] <= '9')
			i++;
		if (start === i)
			fail('expected a number');
		return parseInt(re.substring(start, i));
	}

	function hex(digits: number) {
		const s = re.substring(i, i + digits);
		if (s.length < digits || !/^[0-9a-fA-F]+$/.test(s))
			fail('bad hex escape');
		i += digits;
		return parseInt(s, 16);
	}

	function codePoint(): number {
		const code = re.codePointAt(i);
		if (code === undefined)
			fail('unexpected end of pattern');
		i += code > 0xffff ? 2 : 1;
		return code;
	}

	function backslashed(): escape {
		if (i >= re.length)
			fail('\\ at end of pattern');
		const c = re[i++];
		switch (c) {
			default:	return codePointBefore();
			case 'd':	return builtin(CharClass.Digit);
			case 'D':	return builtin(CharClass.Digit, true);
			case 'w':	return builtin(CharClass.Word);
			case 'W':	return builtin(CharClass.Word, true);
			case 's':	return builtin(CharClass.Space);
			case 'S':	return builtin(CharClass.Space, true);
			case 'b':	return 8;  				//backspace
			case 't':	return 9;  				//tab
			case 'n':	return 10;  			//newline
			case 'v':	return 11;  			//vertical tab
			case 'f':	return 12;  			//form feed
			case 'r':	return 13;  			//carriage return
			case 'c': {
				const code = re.charCodeAt(i++);
				if (Number.isNaN(code))
					fail('bad \\c escape');
				return code & 31;
			}
			case '0':	return 0;
			case 'x':	return hex(2);

			case 'u':
				if (check('{')) {
					const start = i;
					const code = parseInt(skipTo('}'), 16);
					if (Number.isNaN(code) || code > 0x10ffff)
						fail('bad \\u{} escape', start);
					return code;
				}
				return hex(4);

			case 'p':
			case 'P': {
				if (!check('{'))
					fail(`\\${c} must be followed by {property}`);
				const start	= i;
				const name	= skipTo('}');
				const kind	= classifyProperty(name);
				if (!kind)
					fail(`Unknown Unicode property ${name}`, start);
				return property(kind, propertyValue(name), c === 'P');
			}
		}
	}

	// the escaped character itself, which may be outside the BMP
	function codePointBefore() {
		--i;
		return codePoint();
	}

	function character(): escape {
		const code = codePoint();
		return code === 92 ? backslashed() : code;
	}

	function charClass() {
		const negated	= check('^');
		const items:	setItem[] = [];

		while (i < re.length && re[i] !== ']') {
			const start = i;
			const from	= character();
			if (typeof from === 'number' && re[i] === '-' && i + 1 < re.length && re[i + 1] !== ']') {
				++i;
				const to = character();
				if (typeof to !== 'number' || from > to)
					fail('bad character class range', start);
				items.push([from, to]);
			} else {
				items.push(from);
			}
		}
		if (!check(']'))
			fail('unterminated character class');
		return set(items, negated);
	}

	function addQuantified(min: number, max: number) {
		if (max !== -1 && max < min)
			fail('numbers out of order in quantifier');

		const mod: quantifiedMod = check('?') ? 'lazy' : 'greedy';
		const top = curr.pop();
		if (top === undefined || assertions.has(type(top)) || is(top, 'noncapture') && top.options !== undefined)
			fail('nothing to quantify');

		if (typeof top === 'string') {
			const codes = Array.from(top);
			if (codes.length > 1) {
				curr.push(codes.slice(0, -1).join(''));
				curr.push(repeatFrom(codes[codes.length - 1], min, max, mod));
				return;
			}
		}
		curr.push(repeatFrom(top, min, max, mod));
	}

	function addText(c: string) {
		const last = curr.length - 1;
		const prev = curr[last];
		if (typeof prev === 'string')
			curr[last] = prev + c;
		else
			curr.push(c);
	}

	function closeAlt() {
		let top = stack.pop();
		if (top?.type === 'alt') {
			top.parts.push(concatenation(...curr));
			curr = [alternation(...top.parts)];
			top = stack.pop();
		}
		return top;
	}

	const specialChars = /[\\^$*+?{()|[.]/;

	while (i < re.length) {
		const remaining	= re.substring(i);
		const next		= remaining.search(specialChars);

		if (next === -1) {
			addText(remaining);
			break;
		}

		if (next > 0)
			addText(remaining.substring(0, next));

		i += next;
		const at = i;
		switch (re[i++]) {
			case '\\':
				if (check('b')) {
					curr.push(wordBoundary);
				} else if (check('B')) {
					curr.push(nonWordBoundary);
				} else if (re[i] >= '1' && re[i] <= '9') {
					curr.push({type: 'reference', value: int()});
				} else if (check('k<')) {
					curr.push({type: 'reference', value: skipTo('>')});
				} else {
					const b = backslashed();
					if (typeof b === 'number')
						addText(String.fromCodePoint(b));
					else
						curr.push(set([b]));
				}
				break;

			case '.':
				curr.push(any);
				break;

		//Boundary-type assertions
			case '^':
				curr.push(startAnchor);
				break;
			case '$':
				curr.push(endAnchor);
				break;

		//Quantifiers
			case '*':
				addQuantified(0, -1);
				break;
			case '+':
				addQuantified(1, -1);
				break;
			case '?':
				addQuantified(0, 1);
				break;
			case '{': {
				const	min = int();
				const	max = check(',') ? (re[i] !== '}' ? int() : -1) : min;
				if (!check('}'))
					fail("Missing '}'", at);
				addQuantified(min, max);
				break;
			}

		//Alternation
			case '|': {
				const top = stack.at(-1);
				if (top?.type === 'alt')
					top.parts.push(concatenation(...curr));
				else
					stack.push({type: 'alt', parts: [concatenation(...curr)]});
				curr = [];
				break;
			}

		//Groups
			case '(': {
				let group: capture | noncapture;
				const dummy = '';
				if (check('?')) {
					switch (re[i++]) {
						case ':':
							group = noncapture(dummy);
							break;
						case '=':
							group = noncapture(dummy, 'ahead');
							break;
						case '!':
							group = noncapture(dummy, 'neg_ahead');
							break;
						case '<':
							if (check('=')) {
								group = noncapture(dummy, 'behind');
							} else if (check('!')) {
								group = noncapture(dummy, 'neg_behind');
							} else {
								const name = skipTo('>');
								if (!/^[A-Za-z_$][\w$]*$/.test(name))
									fail(`bad group name '${name}'`, at);
								group = capture(dummy, name);
							}
							break;
						default:
							fail('unsupported group', at);
					}
				} else {
					group = capture(dummy);
				}

				stack.push({type: 'group', group, tos: curr});
				curr = [];
				break;
			}

			case ')': {
				const top = closeAlt();
				if (top?.type !== 'group')
					fail('unmatched )', at);

				top.group.part = concatenation(...curr);
				curr = [...top.tos, top.group];
				break;
			}

		//Character classes
			case '[':
				curr.push(charClass());
				break;
		}
	}

	const top = closeAlt();
	if (top)
		fail('unmatched (');

	return concatenation(...curr);
}

//-----------------------------------------------------------------------------
// Regex to string
//-----------------------------------------------------------------------------

function printQuantified(min: number, max: number, mod: quantifiedMod): string {
	return (min === 0 && max === -1 ? '*'
		: min === 1 && max === -1 ? '+'
		: min === 0 && max === 1 ? '?'
		: max === -1 ? `{${min},}`
		: min === max ? `{${min}}`
		: `{${min},${max}}`
	) + (mod === 'lazy' ? '?' : '');
}

const builtinNames: Partial<Record<CharClass, string>> = {
	[CharClass.Digit]:	'd',
	[CharClass.Word]:	'w',
	[CharClass.Space]:	's',
};

const propertyPrefixes = {
	property:	'',
	gc:			'gc=',
	script:		'sc=',
	scx:		'scx=',
};

function printEscape(item: builtin | property): string {
	if (item.type === 'property')
		return `\\${item.negated ? 'P' : 'p'}{${propertyPrefixes[item.kind]}${item.name}}`;
	const name = builtinNames[item.name];
	if (!name)
		throw new Error(`no escape for character class ${item.name}`);
	return `\\${item.negated ? name.toUpperCase() : name}`;
}

function printSetChar(code: number) {
	return escapeText(String.fromCodePoint(code)).replace(/-/g, '\\-');
}

function list(parts: part[], join: string): string {
	return parts.map((p, i) => {
		if (is(p, 'quantified') && is(p.part, 'text') && i > 0 && is(parts[i - 1], 'text'))
			return `(?:${toRegExpString(p.part)})` + printQuantified(p.min, p.max, p.mod);

		const s = toRegExpString(p);
		return is(p, 'alt') && join === '' ? `(?:${s})` : s;
	}).join(join);
}

export function toRegExpString(part: part): string {
	if (typeof part === 'string')
		return escapeText(part);

	if (Array.isArray(part))
		return list(part, '');

	switch (part.type) {
		case 'alt':
			return list(part.parts, '|');

		case 'quantified': {
			const inner		= toRegExpString(part.part);
			const grouped	= typeof part.part === 'string'
				? Array.from(part.part).length !== 1
				: Array.isArray(part.part) || is(part.part, 'alt') || is(part.part, 'quantified');
			return (grouped ? `(?:${inner})` : inner) + printQuantified(part.min, part.max, part.mod);
		}

		case 'noncapture': {
			const header = part.options ? {
				ahead:		'=',
				behind:		'<=',
				neg_ahead:	'!',
				neg_behind:	'<!',
			}[part.options] : ':';
			return `(?${header}${toRegExpString(part.part)})`;
		}

		case 'capture':
			return `(${part.name ? `?<${part.name}>` : ''}${toRegExpString(part.part)})`;

		case 'set': {
			if (!part.negated && part.items.length === 1 && typeof part.items[0] === 'object' && !Array.isArray(part.items[0]))
				return printEscape(part.items[0]);

			const body = part.items.map(item =>
				typeof item === 'number'	? printSetChar(item)
				: Array.isArray(item)		? `${printSetChar(item[0])}-${printSetChar(item[1])}`
				: printEscape(item)
			).join('');
			return `[${part.negated ? '^' : ''}${body}]`;
		}

		case 'builtin':
		case 'property':
			return printEscape(part);

		case 'any':
			return '.';

		case 'wordbound':
			return '\\b';
		case 'nowordbound':
			return '\\B';
		case 'inputboundstart':
			return '^';
		case 'inputboundend':
			return '$';

		case 'reference':
			return typeof part.value === 'number' ? `\\${part.value}` : `\\k<${part.value}>`;
	}
}
