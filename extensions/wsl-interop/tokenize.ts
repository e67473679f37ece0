/**
 * Splits the editor's shell-mode line into words.
 *
 * Only as much grammar as locating words needs: whitespace separates words,
 * single and double quotes group, a backtick escapes the next character, and
 * unquoted `| ; & < >` runs are operator tokens of their own.
 * A word that starts with a quote ends at its closing quote, so
 * `'/mnt/c/Program Files'/Win` is two adjacent tokens.
 */

import type { Token } from "./types.js";

const WHITESPACE = /\s/;
const OPERATOR = /[|;&<>]/;

function readQuoted(line: string, start: number, value: string[]): number {
	const quote = line[start];
	let i = start + 1;
	while (i < line.length && line[i] !== quote) {
		if (quote === '"' && line[i] === "`" && i + 1 < line.length) {
			i++;
		}
		value.push(line[i]);
		i++;
	}
	return i < line.length ? i + 1 : i;
}

export function tokenize(line: string): Token[] {
	const tokens: Token[] = [];
	let i = 0;

	while (i < line.length) {
		if (WHITESPACE.test(line[i])) {
			i++;
			continue;
		}

		const start = i;
		const value: string[] = [];

		if (OPERATOR.test(line[i])) {
			while (i < line.length && OPERATOR.test(line[i])) i++;
			tokens.push({ text: line.slice(start, i), value: line.slice(start, i), start, end: i, operator: true });
			continue;
		}

		if (line[i] === "'" || line[i] === '"') {
			i = readQuoted(line, i, value);
		} else {
			while (i < line.length && !WHITESPACE.test(line[i]) && !OPERATOR.test(line[i])) {
				const ch = line[i];
				if (ch === "`" && i + 1 < line.length) {
					value.push(line[i + 1]);
					i += 2;
				} else if (ch === "'" || ch === '"') {
					i = readQuoted(line, i, value);
				} else {
					value.push(ch);
					i++;
				}
			}
		}

		tokens.push({ text: line.slice(start, i), value: value.join(""), start, end: i });
	}

	return tokens;
}

/** Argument values for execution; tokens with no whitespace between them form one argument. */
export function commandArguments(tokens: readonly Token[]): string[] {
	const args: string[] = [];
	let previous: Token | undefined;

	for (const token of tokens) {
		if (previous && previous.end === token.start) {
			args[args.length - 1] += token.value;
		} else {
			args.push(token.value);
		}
		previous = token;
	}

	return args;
}
