import { CommandParseError } from '../errors.js';

export type Literal = string | number | boolean | null;

export interface ParsedCommand {
	/** Dotted operation name with the bound device name stripped, e.g. `anim.play_animation`. */
	operation: string;
	positional: Literal[];
	named: Record<string, Literal>;
}

export interface ParseOptions {
	/** Name the device is addressed by in command text. */
	boundName?: string;
}

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /\w/;
const NUMBER = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

const KEYWORDS: Record<string, Literal> = {
	true: true,
	True: true,
	false: false,
	False: false,
	null: null,
	None: null,
};

const ESCAPES: Record<string, string> = {
	n: '\n',
	t: '\t',
	r: '\r',
	'\\': '\\',
	"'": "'",
	'"': '"',
};

/**
 * Parse command text such as `robot.say_text('hi')` or
 * `robot.drive_straight(100, speed=50)`. A call without parentheses
 * (`robot.battery`) takes no arguments.
 */
export function parseCommand(text: string, options: ParseOptions = {}): ParsedCommand {
	return new CommandParser(text, options.boundName ?? 'robot').parse();
}

class CommandParser {
	private pos = 0;

	constructor(
		private readonly text: string,
		private readonly boundName: string,
	) {}

	parse(): ParsedCommand {
		this.skipWhitespace();
		const path = this.parsePath();

		if (path[0] === this.boundName) {
			path.shift();
		}
		if (path.length === 0) {
			this.fail(`expected an operation after "${this.boundName}."`);
		}

		const positional: Literal[] = [];
		const named: Record<string, Literal> = {};

		this.skipWhitespace();
		if (this.peek() === '(') {
			this.pos++;
			this.parseArguments(positional, named);
		}

		this.skipWhitespace();
		if (this.peek() === ';') {
			this.pos++;
			this.skipWhitespace();
		}
		if (!this.atEnd()) {
			this.fail(`unexpected "${this.peek()}"`);
		}

		return { operation: path.join('.'), positional, named };
	}

	private parsePath(): string[] {
		const segments = [this.parseIdentifier()];
		while (this.peek() === '.') {
			this.pos++;
			segments.push(this.parseIdentifier());
		}
		return segments;
	}

	private parseIdentifier(): string {
		const start = this.pos;
		if (!IDENT_START.test(this.peek())) {
			this.fail(this.atEnd() ? 'expected a name' : `expected a name, found "${this.peek()}"`);
		}
		this.pos++;
		while (!this.atEnd() && IDENT_PART.test(this.peek())) {
			this.pos++;
		}
		return this.text.slice(start, this.pos);
	}

	private parseArguments(positional: Literal[], named: Record<string, Literal>): void {
		this.skipWhitespace();
		if (this.peek() === ')') {
			this.pos++;
			return;
		}

		for (;;) {
			this.skipWhitespace();
			const keyword = this.tryKeywordName();

			if (keyword !== undefined) {
				if (Object.hasOwn(named, keyword)) {
					this.fail(`argument "${keyword}" given twice`);
				}
				named[keyword] = this.parseLiteral();
			} else {
				if (Object.keys(named).length > 0) {
					this.fail('positional argument follows keyword argument');
				}
				positional.push(this.parseLiteral());
			}

			this.skipWhitespace();
			const next = this.peek();
			this.pos++;
			if (next === ')') return;
			if (next !== ',') {
				this.pos--;
				this.fail(this.atEnd() ? 'missing ")"' : `expected "," or ")", found "${next}"`);
			}

			// Trailing comma
			this.skipWhitespace();
			if (this.peek() === ')') {
				this.pos++;
				return;
			}
		}
	}

	/** Consume `name =` when present and return the name. */
	private tryKeywordName(): string | undefined {
		const match = /^([A-Za-z_]\w*)\s*=(?!=)/.exec(this.text.slice(this.pos));
		if (!match || Object.hasOwn(KEYWORDS, match[1])) return undefined;
		if (match[1] === '__proto__') {
			this.fail('invalid argument name "__proto__"');
		}
		this.pos += match[0].length;
		this.skipWhitespace();
		return match[1];
	}

	private parseLiteral(): Literal {
		this.skipWhitespace();
		const ch = this.peek();

		if (ch === "'" || ch === '"') {
			return this.parseString(ch);
		}

		const number = NUMBER.exec(this.text.slice(this.pos));
		if (number) {
			this.pos += number[0].length;
			return Number(number[0]);
		}

		if (IDENT_START.test(ch)) {
			const start = this.pos;
			const word = this.parseIdentifier();
			if (Object.hasOwn(KEYWORDS, word)) {
				return KEYWORDS[word];
			}
			this.pos = start;
			return this.fail(`"${word}" is not a value; quote text arguments`);
		}

		return this.fail(this.atEnd() ? 'expected a value' : `expected a value, found "${ch}"`);
	}

	private parseString(quote: string): string {
		const start = this.pos;
		this.pos++;
		let value = '';

		while (!this.atEnd()) {
			const ch = this.text[this.pos];
			this.pos++;
			if (ch === quote) return value;
			if (ch === '\\') {
				if (this.atEnd()) break;
				const escaped = this.text[this.pos];
				this.pos++;
				value += ESCAPES[escaped] ?? escaped;
			} else {
				value += ch;
			}
		}

		this.pos = start;
		return this.fail('unterminated string');
	}

	private skipWhitespace(): void {
		while (!this.atEnd() && /\s/.test(this.text[this.pos])) {
			this.pos++;
		}
	}

	private peek(): string {
		return this.text[this.pos] ?? '';
	}

	private atEnd(): boolean {
		return this.pos >= this.text.length;
	}

	private fail(message: string): never {
		throw new CommandParseError(this.text, this.pos, message);
	}
}
