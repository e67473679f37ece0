/**
 * Remote bash completion for imported commands.
 *
 * The editor's line, words and cursor are mapped onto the bash
 * programmable completion variables (COMP_LINE, COMP_WORDS, COMP_CWORD,
 * COMP_POINT), the command's completion function runs in WSL, and COMPREPLY
 * comes back as candidates ready for the editor.
 */

import type { CompletionFunctionResolver } from "./completion-functions.js";
import { IGNORE_CASE, loadCommandCompletion, PRINT_COMPREPLY, sourceBashCompletion } from "./completion-script.js";
import { formatArgument, shellQuote } from "./format.js";
import { serializeRequest } from "./request.js";
import type { Bridge, CompletionCandidate, CursorContext, RemoteRequest, Token } from "./types.js";

const ASSIGNMENT_PREFIX = /^(.*=)/;

/**
 * Locate the word under the cursor. A cursor inside a word, directly after
 * its last character, or in the whitespace before it edits that word; past
 * the last word it edits a new trailing word. Returns undefined while the
 * cursor is still on the command name.
 */
export function resolveCursorContext(line: string, tokens: readonly Token[], cursor: number): CursorContext | undefined {
	if (tokens.length === 0 || cursor <= tokens[0].end) {
		return undefined;
	}

	let index = tokens.length;
	for (let i = 1; i < tokens.length; i++) {
		if (cursor <= tokens[i].end) {
			index = i;
			break;
		}
	}

	const words = tokens.map((token) => token.text);
	let wordStart = index < tokens.length ? tokens[index].start : cursor;
	let previousWord = words[index - 1];
	let compLine = line;

	// '/mnt/c/Program Files'/Win: the quoted path and its continuation are one word
	const current = tokens[index];
	const previous = tokens[index - 1];
	if (current && index >= 2 && current.text.startsWith("/") && current.start === previous.end) {
		wordStart = previous.start;
		const merged = line.slice(wordStart, cursor);
		compLine = line.slice(0, wordStart) + merged + line.slice(current.end);
		words.splice(index - 1, 2, merged);
		index -= 1;
		previousWord = words[index - 1];
	}

	const word = cursor > wordStart ? line.slice(wordStart, cursor) : "";
	if (index === words.length) {
		words.push("");
	}

	return { index, previousWord, word, line: compLine, words, point: cursor };
}

export function buildCompletionRequest(command: string, completionFunction: string, context: CursorContext): RemoteRequest {
	return {
		preamble: [
			sourceBashCompletion(),
			loadCommandCompletion(command),
			`COMP_LINE=${shellQuote(context.line)}`,
			`COMP_WORDS=(${context.words.map(shellQuote).join(" ")})`,
			`COMP_CWORD=${context.index}`,
			`COMP_POINT=${context.point}`,
			IGNORE_CASE,
		],
		argv: [
			completionFunction,
			shellQuote(command),
			shellQuote(context.word),
			shellQuote(context.previousWord),
			"2> /dev/null",
		],
		epilogue: PRINT_COMPREPLY,
	};
}

function compareCandidates(a: string, b: string): number {
	const lowerA = a.toLowerCase();
	const lowerB = b.toLowerCase();
	if (lowerA !== lowerB) return lowerA < lowerB ? -1 : 1;
	if (a === b) return 0;
	return a < b ? -1 : 1;
}

/**
 * One entry per line, empty lines dropped, unique by exact text. Entries
 * differing only by case end up next to each other.
 */
export function parseCompletionOutput(stdout: string): string[] {
	const lines = stdout.split(/\r?\n/).filter((line) => line.length > 0);
	return Array.from(new Set(lines)).sort(compareCandidates);
}

/**
 * Turn COMPREPLY entries into editor candidates for `word`.
 *
 * The editor matches case-insensitively, so a candidate equal to its
 * predecessor but for case gets a trailing space in its label.
 */
export function toCandidates(entries: readonly string[], word: string, otherWords: ReadonlySet<string>): CompletionCandidate[] {
	const assignment = ASSIGNMENT_PREFIX.exec(word);

	const candidates: CompletionCandidate[] = [];
	for (const entry of entries) {
		if (assignment) {
			candidates.push({ value: formatArgument(assignment[1] + entry, true), label: entry });
			continue;
		}

		const value = formatArgument(entry, true);
		if (!otherWords.has(value)) {
			candidates.push({ value, label: value });
		}
	}

	return candidates.reduce<{ previous?: string; result: CompletionCandidate[] }>(
		(acc, candidate) => {
			const collides = candidate.value.toLowerCase() === acc.previous?.toLowerCase();
			acc.result.push(collides ? { ...candidate, label: `${candidate.label} ` } : candidate);
			return { previous: candidate.value, result: acc.result };
		},
		{ result: [] },
	).result;
}

export interface CompleteOptions {
	bridge: Bridge;
	resolver: CompletionFunctionResolver;
}

export interface CompletionResult {
	candidates: CompletionCandidate[];
	/** Text before the cursor the candidates replace. */
	word: string;
}

export function complete(
	line: string,
	tokens: readonly Token[],
	cursor: number,
	options: CompleteOptions,
): CompletionResult | undefined {
	const context = resolveCursorContext(line, tokens, cursor);
	if (!context) {
		return undefined;
	}

	const command = tokens[0].value;
	const completionFunction = options.resolver.resolve(command);
	const request = buildCompletionRequest(command, completionFunction, context);
	const result = options.bridge.run(serializeRequest(request));

	const otherWords = new Set(context.words.filter((_, i) => i !== context.index));
	return {
		candidates: toCandidates(parseCompletionOutput(result.stdout), context.word, otherWords),
		word: context.word,
	};
}
