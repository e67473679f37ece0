import { complete, type CompletionResult } from "./completion.js";
import type { CompletionFunctionResolver } from "./completion-functions.js";
import type { CommandInvoker, StreamingInvokeOptions } from "./invoke.js";
import { commandArguments, tokenize } from "./tokenize.js";
import type { Bridge, Token } from "./types.js";

export interface ImportedCommand {
	name: string;
	execute(args: readonly string[], options: StreamingInvokeOptions): Promise<number | null>;
	complete(line: string, tokens: readonly Token[], cursor: number): CompletionResult | undefined;
}

export interface CommandMatch {
	command: ImportedCommand;
	args: string[];
	/** Host command line whose output feeds the imported command, for `a | b`. */
	upstream?: string;
}

export interface CommandRegistryOptions {
	bridge: Bridge;
	invoker: CommandInvoker;
	resolver: CompletionFunctionResolver;
}

function lastOperator(tokens: readonly Token[], before: number): number {
	for (let i = tokens.length - 1; i >= 0; i--) {
		if (tokens[i].operator && tokens[i].end <= before) return i;
	}
	return -1;
}

/** Commands imported from WSL, each bound to the invoker and to remote completion. */
export class CommandRegistry {
	private commands = new Map<string, ImportedCommand>();
	private options: CommandRegistryOptions;

	constructor(options: CommandRegistryOptions) {
		this.options = options;
	}

	register(names: readonly string[]): ImportedCommand[] {
		const { bridge, invoker, resolver } = this.options;
		const registered: ImportedCommand[] = [];

		for (const name of names) {
			if (!name || /[\s|;&<>'"`]/.test(name)) {
				throw new Error(`Invalid command name: "${name}"`);
			}

			const command: ImportedCommand = {
				name,
				execute: (args, options) => invoker.invokeStreaming(name, args, options),
				complete: (line, tokens, cursor) => complete(line, tokens, cursor, { bridge, resolver }),
			};
			this.commands.set(name, command);
			registered.push(command);
		}

		return registered;
	}

	get(name: string): ImportedCommand | undefined {
		return this.commands.get(name);
	}

	names(): string[] {
		return Array.from(this.commands.keys()).sort();
	}

	/**
	 * The imported command a shell line runs. Matches `cmd args` and
	 * `host pipeline | cmd args`; any other operator leaves the line to the host.
	 */
	match(line: string): CommandMatch | undefined {
		const tokens = tokenize(line);
		const split = lastOperator(tokens, line.length);
		if (split !== -1 && tokens[split].text !== "|") return undefined;

		const segment = tokens.slice(split + 1);
		if (segment.length === 0) return undefined;

		const command = this.commands.get(segment[0].value);
		if (!command) return undefined;

		const args = commandArguments(segment.slice(1));
		if (split === -1) return { command, args };

		const upstream = line.slice(0, tokens[split].start).trim();
		return upstream ? { command, args, upstream } : undefined;
	}

	/** Completions for the imported command under the cursor, if any. */
	complete(line: string, cursor: number): CompletionResult | undefined {
		const tokens = tokenize(line);
		const split = lastOperator(tokens, cursor);
		const offset = split === -1 ? 0 : tokens[split].end;

		const segment = tokens.slice(split + 1).map((token) => ({
			...token,
			start: token.start - offset,
			end: token.end - offset,
		}));
		const command = segment[0] && !segment[0].operator ? this.commands.get(segment[0].value) : undefined;
		if (!command) return undefined;

		const stop = segment.findIndex((token) => token.operator);
		const words = stop === -1 ? segment : segment.slice(0, stop);
		const segmentLine = line.slice(offset, stop === -1 ? line.length : offset + segment[stop].start);

		return command.complete(segmentLine, words, cursor - offset);
	}
}

/** Split a `--wsl-commands` value or `/wsl-import` argument into names. */
export function parseCommandList(value: string): string[] {
	return value.split(/[\s,]+/).filter((name) => name.length > 0);
}
