//-----------------------------------------------------------------------------
//	Unicode property lookups
//-----------------------------------------------------------------------------

export type PropertyKind = 'property' | 'gc' | 'script' | 'scx';

const prefixes: Record<PropertyKind, string> = {
	property:	'',
	gc:			'General_Category=',
	script:		'Script=',
	scx:		'Script_Extensions=',
};

const cache = new Map<string, RegExp | null>();

function matcher(kind: PropertyKind, name: string): RegExp | null {
	const key = `${kind}:${name}`;
	let re = cache.get(key);
	if (re === undefined) {
		re = compile(`^\\p{${prefixes[kind]}${name}}$`);
		cache.set(key, re);
	}
	return re;
}

function compile(source: string): RegExp | null {
	try {
		return new RegExp(source, 'u');
	} catch (e) {
		if (e instanceof SyntaxError)
			return null;
		throw e;
	}
}

export function isValidProperty(kind: PropertyKind, name: string): boolean {
	return matcher(kind, name) !== null;
}

export function hasProperty(kind: PropertyKind, name: string, code: number): boolean {
	const re = matcher(kind, name);
	if (!re)
		throw new Error(`Unknown Unicode property ${prefixes[kind]}${name}`);
	return re.test(String.fromCodePoint(code));
}

// bare names may be a general category value, a script, or a binary property
export function classifyProperty(name: string): PropertyKind | undefined {
	const eq = name.indexOf('=');
	if (eq >= 0) {
		const prefix = name.slice(0, eq);
		switch (prefix) {
			case 'gc': case 'General_Category':		return 'gc';
			case 'sc': case 'Script':				return 'script';
			case 'scx': case 'Script_Extensions':	return 'scx';
		}
		return undefined;
	}
	return isValidProperty('gc', name) ? 'gc'
		: isValidProperty('property', name) ? 'property'
		: isValidProperty('script', name) ? 'script'
		: undefined;
}

export function propertyValue(name: string) {
	const eq = name.indexOf('=');
	return eq >= 0 ? name.slice(eq + 1) : name;
}

//-----------------------------------------------------------------------------
//	Case folding (simple, ASCII)
//-----------------------------------------------------------------------------

export function toLower(code: number) {
	return code >= 0x41 && code <= 0x5a ? code + 0x20 : code;
}

export function swapCase(code: number) {
	return code >= 0x41 && code <= 0x5a ? code + 0x20
		: code >= 0x61 && code <= 0x7a ? code - 0x20
		: code;
}

export function isLineTerminator(code: number) {
	return code === 0x0a || code === 0x0d || code === 0x2028 || code === 0x2029;
}

export function isWordChar(code: number) {
	return (code >= 0x30 && code <= 0x39)
		|| (code >= 0x41 && code <= 0x5a)
		|| (code >= 0x61 && code <= 0x7a)
		|| code === 0x5f;
}
