/**
 * Subprocess bridge to WSL.
 *
 * Every call spawns `wsl.exe [-d <distribution>] --exec bash -c <line>`.
 * `--exec` hands the arguments to bash verbatim, so the joined line reaches
 * the remote shell exactly as serialized.
 */

import { spawn, spawnSync } from "node:child_process";

import { shellQuote } from "./format.js";
import type { Bridge, BridgeResult, BridgeRunOptions, BridgeStreamOptions } from "./types.js";

const MAX_BUFFER = 16 * 1024 * 1024;

export class BridgeUnavailableError extends Error {
	readonly executable: string;

	constructor(executable: string, cause: Error) {
		super(`Unable to start ${executable}: ${cause.message}`, { cause });
		this.name = "BridgeUnavailableError";
		this.executable = executable;
	}
}

export interface WslBridgeOptions {
	executable?: string;
	distribution?: string;
}

export class WslBridge implements Bridge {
	private executable: string;
	private distribution: string | undefined;

	constructor(options: WslBridgeOptions = {}) {
		this.executable = options.executable ?? "wsl.exe";
		this.distribution = options.distribution;
	}

	private argsFor(words: readonly string[]): string[] {
		const args: string[] = [];
		if (this.distribution) {
			args.push("-d", this.distribution);
		}
		args.push("--exec", "bash", "-c", words.join(" "));
		return args;
	}

	run(words: readonly string[], options: BridgeRunOptions = {}): BridgeResult {
		const result = spawnSync(this.executable, this.argsFor(words), {
			encoding: "utf-8",
			input: options.input,
			cwd: options.cwd,
			maxBuffer: MAX_BUFFER,
			windowsHide: true,
		});

		if (result.error) {
			throw new BridgeUnavailableError(this.executable, result.error);
		}

		return {
			stdout: result.stdout,
			stderr: result.stderr,
			exitCode: result.status,
		};
	}

	stream(words: readonly string[], options: BridgeStreamOptions): Promise<number | null> {
		const { input, cwd, onData, signal } = options;

		return new Promise((resolve, reject) => {
			const child = spawn(this.executable, this.argsFor(words), {
				cwd,
				stdio: [input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
				windowsHide: true,
			});

			child.stdout?.on("data", onData);
			child.stderr?.on("data", onData);

			const onAbort = () => {
				child.kill();
			};
			signal?.addEventListener("abort", onAbort, { once: true });

			child.on("error", (err) => {
				signal?.removeEventListener("abort", onAbort);
				reject(new BridgeUnavailableError(this.executable, err));
			});

			child.on("close", (code) => {
				signal?.removeEventListener("abort", onAbort);
				if (signal?.aborted) {
					reject(new Error("aborted"));
				} else {
					resolve(code);
				}
			});

			if (input !== undefined && child.stdin) {
				// A command that stops reading early closes the pipe; its exit code still decides
				child.stdin.on("error", (err: NodeJS.ErrnoException) => {
					if (err.code !== "EPIPE") reject(err);
				});
				child.stdin.end(input);
			}
		});
	}

	pathmap(windowsPath: string): string {
		const result = this.run(["wslpath", "-u", shellQuote(windowsPath)]);
		const mapped = result.stdout.trim();
		if (result.exitCode !== 0 || !mapped) {
			throw new Error(`wslpath could not map ${windowsPath}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
		}
		return mapped;
	}
}
