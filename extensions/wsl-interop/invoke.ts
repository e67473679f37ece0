import { defaultArgumentsFor } from "./config.js";
import { translatePathIfApplicable } from "./paths.js";
import { serializeRequest } from "./request.js";
import type { Bridge, BridgeResult, InteropConfig, RemoteRequest } from "./types.js";

export interface InvokeOptions {
	input?: string | Buffer;
	cwd?: string;
}

export interface StreamingInvokeOptions extends InvokeOptions {
	onData: (data: Buffer) => void;
	signal?: AbortSignal;
}

export interface CommandInvokerOptions {
	bridge: Bridge;
	/** Read once per invocation, so edits made between invocations apply. */
	getConfig: () => InteropConfig;
	exists?: (path: string) => boolean;
}

/**
 * Runs an imported command in WSL: environment prefix, default arguments,
 * then the caller's arguments with host paths translated.
 */
export class CommandInvoker {
	private bridge: Bridge;
	private getConfig: () => InteropConfig;
	private exists: ((path: string) => boolean) | undefined;

	constructor(options: CommandInvokerOptions) {
		this.bridge = options.bridge;
		this.getConfig = options.getConfig;
		this.exists = options.exists;
	}

	buildRequest(command: string, args: readonly (string | null | undefined)[], cwd: string = process.cwd()): RemoteRequest {
		const config = this.getConfig();
		const argv = [command];

		const defaults = defaultArgumentsFor(config.defaultParameters, command);
		if (defaults) {
			argv.push(defaults);
		}

		for (const arg of args) {
			if (arg == null) continue;
			argv.push(translatePathIfApplicable(arg, { bridge: this.bridge, cwd, exists: this.exists }));
		}

		return { environment: config.environmentVariables, argv };
	}

	invoke(command: string, args: readonly (string | null | undefined)[], options: InvokeOptions = {}): BridgeResult {
		const words = serializeRequest(this.buildRequest(command, args, options.cwd));
		return this.bridge.run(words, { input: options.input, cwd: options.cwd });
	}

	async invokeStreaming(
		command: string,
		args: readonly (string | null | undefined)[],
		options: StreamingInvokeOptions,
	): Promise<number | null> {
		const words = serializeRequest(this.buildRequest(command, args, options.cwd));
		return this.bridge.stream(words, options);
	}
}
