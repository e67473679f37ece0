/**
 * Completion function resolution and its per-user cache.
 *
 * Names are cached forever: once a command has an entry it is never asked
 * again, even across restarts. Delete the cache file to pick up new
 * completion definitions.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { BridgeUnavailableError } from "./bridge.js";
import {
	FALLBACK_COMPLETION_FUNCTION,
	loadCommandCompletion,
	printCompletionFunctionWords,
	sourceBashCompletion,
} from "./completion-script.js";
import { serializeRequest } from "./request.js";
import type { Bridge, CompletionFunctionStore } from "./types.js";

const cacheFileSchema = Type.Record(Type.String(), Type.String());

const FUNCTION_NAME = /^[^\s'"`;|&<>()$]+$/;

export function defaultCachePath(): string {
	return join(homedir(), ".pi", "agent", "wsl-interop", "completion-functions.json");
}

export class MemoryCompletionFunctionStore implements CompletionFunctionStore {
	protected functions = new Map<string, string>();
	loaded = false;

	load(): void {
		this.loaded = true;
	}

	get(command: string): string | undefined {
		return this.functions.get(command);
	}

	put(command: string, completionFunction: string): void {
		this.functions.set(command, completionFunction);
	}

	entries(): [string, string][] {
		return Array.from(this.functions.entries());
	}
}

/** Store backed by a JSON file, rewritten in full on every put. Failed writes keep the entry in memory. */
export class FileCompletionFunctionStore extends MemoryCompletionFunctionStore {
	readonly path: string;

	constructor(path: string = defaultCachePath()) {
		super();
		this.path = path;
	}

	load(): void {
		if (this.loaded) return;
		this.loaded = true;

		if (!existsSync(this.path)) return;

		try {
			const raw: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
			if (Value.Check(cacheFileSchema, raw)) {
				this.functions = new Map(Object.entries(raw));
			}
		} catch (e) {
			console.error(`Warning: Could not read ${this.path}, starting with an empty cache: ${e}`);
		}
	}

	put(command: string, completionFunction: string): void {
		super.put(command, completionFunction);
		try {
			mkdirSync(dirname(this.path), { recursive: true });
			writeFileSync(this.path, `${JSON.stringify(Object.fromEntries(this.functions), null, 2)}\n`);
		} catch (e) {
			console.error(`Warning: Could not write ${this.path}, keeping ${command} in memory only: ${e}`);
		}
	}
}

/** Interpret the resolver query's output, falling back to path completion. */
export function parseCompletionFunction(stdout: string, exitCode: number | null): string {
	const name = stdout.trim();
	if (exitCode !== 0 || !name || name.startsWith("complete") || !FUNCTION_NAME.test(name)) {
		return FALLBACK_COMPLETION_FUNCTION;
	}
	return name;
}

export class CompletionFunctionResolver {
	private bridge: Bridge;
	private store: CompletionFunctionStore;

	constructor(bridge: Bridge, store: CompletionFunctionStore) {
		this.bridge = bridge;
		this.store = store;
	}

	resolve(command: string): string {
		if (!this.store.loaded) {
			this.store.load();
		}

		const cached = this.store.get(command);
		if (cached !== undefined) {
			return cached;
		}

		const words = serializeRequest({
			preamble: [sourceBashCompletion(), loadCommandCompletion(command)],
			argv: printCompletionFunctionWords(command),
		});

		let completionFunction: string;
		try {
			const result = this.bridge.run(words);
			completionFunction = parseCompletionFunction(result.stdout, result.exitCode);
		} catch (err) {
			if (err instanceof BridgeUnavailableError) throw err;
			completionFunction = FALLBACK_COMPLETION_FUNCTION;
		}

		this.store.put(command, completionFunction);
		return completionFunction;
	}
}
