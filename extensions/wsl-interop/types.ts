/**
 * WSL Interop Types
 */

/**
 * A word of the calling command line, as located by the tokenizer.
 * `start`/`end` are a half-open span of 0-based offsets into the line.
 */
export interface Token {
	/** Source text exactly as typed, quotes and escapes included. */
	text: string;
	/** Argument value once quotes and backtick escapes are removed. */
	value: string;
	start: number;
	end: number;
	/** Set on unquoted `|`, `;`, `&`, `<`, `>` runs. */
	operator?: boolean;
}

export interface BridgeResult {
	stdout: string;
	stderr: string;
	exitCode: number | null;
}

export interface BridgeRunOptions {
	input?: string | Buffer;
	cwd?: string;
}

export interface BridgeStreamOptions extends BridgeRunOptions {
	onData: (data: Buffer) => void;
	signal?: AbortSignal;
}

/**
 * Subprocess bridge into the remote environment. Words are joined with single
 * spaces into one remote command line, so every word must already be escaped
 * for the remote shell.
 */
export interface Bridge {
	run(words: readonly string[], options?: BridgeRunOptions): BridgeResult;
	stream(words: readonly string[], options: BridgeStreamOptions): Promise<number | null>;
	/** Map a drive-qualified path (`C:/Users`) to its mount point (`/mnt/c/Users`). */
	pathmap(windowsPath: string): string;
}

/**
 * A remote invocation before serialization. Statements run in order:
 * preamble, then the command (environment assignments prefixed), then epilogue.
 */
export interface RemoteRequest {
	preamble?: readonly string[];
	environment?: ReadonlyMap<string, string>;
	argv: readonly string[];
	epilogue?: readonly string[];
}

export interface DefaultParameters {
	disabled: boolean;
	values: ReadonlyMap<string, string>;
}

export interface InteropConfig {
	commands: string[];
	defaultParameters: DefaultParameters;
	environmentVariables: ReadonlyMap<string, string>;
	distribution?: string;
	bridgeExecutable: string;
}

export interface CursorContext {
	/** Value for COMP_CWORD. */
	index: number;
	previousWord: string;
	/** Text of the word being completed, up to the cursor. */
	word: string;
	/** Value for COMP_LINE. */
	line: string;
	/** Values for COMP_WORDS. */
	words: string[];
	/** Value for COMP_POINT. */
	point: number;
}

/** Host autocomplete item shape: `value` is inserted, `label` is displayed. */
export interface CompletionCandidate {
	value: string;
	label: string;
}

export interface CompletionFunctionStore {
	readonly loaded: boolean;
	load(): void;
	get(command: string): string | undefined;
	put(command: string, completionFunction: string): void;
	entries(): [string, string][];
}
