/**
 * WSL Interop Extension
 *
 * Runs Linux commands inside WSL straight from shell mode (`!` / `!!`), with
 * host paths translated (`C:\Users\me` → `/mnt/c/Users/me`) and Tab completion
 * driven by the command's own bash completion in WSL
 * (e.g. `!git comm` + Tab → `commit`).
 *
 * Config files (merged, project takes precedence):
 * - ~/.pi/agent/wsl-interop.json (global)
 * - <cwd>/.pi/wsl-interop.json (project-local)
 *
 * Usage:
 * - `pi -e ./wsl-interop --wsl-commands grep,less,seq` - import commands
 * - `/wsl-import awk sed` - import more commands for this session
 * - `/wsl` - show imported commands and configuration
 */

import { spawn } from "node:child_process";
import {
	type BashOperations,
	DEFAULT_MAX_BYTES,
	DEFAULT_MAX_LINES,
	type ExtensionAPI,
	type ExtensionContext,
	truncateTail,
} from "@mariozechner/pi-coding-agent";
import { Type } from "@sinclair/typebox";

import { WslCompletionEditor } from "./autocomplete.js";
import { BridgeUnavailableError, WslBridge } from "./bridge.js";
import { CompletionFunctionResolver, FileCompletionFunctionStore } from "./completion-functions.js";
import { loadConfig } from "./config.js";
import { CommandInvoker } from "./invoke.js";
import { type CommandMatch, CommandRegistry, parseCommandList } from "./registry.js";

/** Run the host side of `host | imported` in the user's bash and collect its stdout. */
function runHostCommand(
	command: string,
	cwd: string,
	onData: (data: Buffer) => void,
	signal?: AbortSignal,
): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		const shell = process.env.SHELL;
		const child = spawn(shell && shell.includes("bash") ? shell : "bash", ["-c", command], {
			cwd,
			stdio: ["ignore", "pipe", "pipe"],
		});

		const chunks: Buffer[] = [];
		child.stdout?.on("data", (data: Buffer) => chunks.push(data));
		child.stderr?.on("data", onData);

		const onAbort = () => {
			child.kill("SIGKILL");
		};
		signal?.addEventListener("abort", onAbort, { once: true });

		child.on("error", (err) => {
			signal?.removeEventListener("abort", onAbort);
			reject(err);
		});

		child.on("close", () => {
			signal?.removeEventListener("abort", onAbort);
			if (signal?.aborted) {
				reject(new Error("aborted"));
			} else {
				resolve(Buffer.concat(chunks));
			}
		});
	});
}

function createWslBashOps(match: CommandMatch): BashOperations {
	return {
		async exec(_command, cwd, { onData, signal }) {
			const input = match.upstream ? await runHostCommand(match.upstream, cwd, onData, signal) : undefined;
			const exitCode = await match.command.execute(match.args, { input, cwd, onData, signal });
			return { exitCode };
		},
	};
}

export default function (pi: ExtensionAPI) {
	pi.registerFlag("wsl-commands", {
		description: "Commands to run in WSL, comma separated",
		type: "string",
	});

	let cwd = process.cwd();
	const initialConfig = loadConfig(cwd);
	const getConfig = () => loadConfig(cwd);

	const bridge = new WslBridge({
		executable: initialConfig.bridgeExecutable,
		distribution: initialConfig.distribution,
	});
	const store = new FileCompletionFunctionStore();
	const resolver = new CompletionFunctionResolver(bridge, store);
	const invoker = new CommandInvoker({ bridge, getConfig });
	const registry = new CommandRegistry({ bridge, invoker, resolver });

	let bridgeErrorShown = false;

	function updateStatus(ctx: ExtensionContext): void {
		const count = registry.names().length;
		ctx.ui.setStatus(
			"wsl-interop",
			count > 0 ? ctx.ui.theme.fg("muted", `WSL: ${count} command${count === 1 ? "" : "s"}`) : undefined,
		);
	}

	function importCommands(names: string[], ctx: ExtensionContext): void {
		try {
			registry.register(names);
		} catch (err) {
			ctx.ui.notify(err instanceof Error ? err.message : String(err), "error");
			return;
		}
		updateStatus(ctx);
	}

	pi.on("user_bash", (event) => {
		const match = registry.match(event.command);
		if (!match) return;
		return { operations: createWslBashOps(match) };
	});

	pi.on("session_start", (_event, ctx) => {
		cwd = ctx.cwd;

		const flag = pi.getFlag("wsl-commands");
		const names = [...getConfig().commands, ...(typeof flag === "string" ? parseCommandList(flag) : [])];
		importCommands(names, ctx);

		ctx.ui.setEditorComponent((tui, theme, keybindings) => {
			return new WslCompletionEditor(tui, theme, keybindings, {
				registry,
				onBridgeError: (err: BridgeUnavailableError) => {
					if (bridgeErrorShown) return;
					bridgeErrorShown = true;
					ctx.ui.notify(`WSL completion unavailable: ${err.message}`, "error");
				},
			});
		});
	});

	pi.registerTool({
		name: "wsl",
		label: "WSL",
		description: `Run an imported Linux command inside WSL.
Windows paths in arguments (C:\\Users\\me\\file.txt) and existing relative paths are translated to their WSL form.
Only commands imported into this session can be run; call with an unknown command to list them.`,
		parameters: Type.Object({
			command: Type.String({ description: "Imported command name, e.g. grep" }),
			args: Type.Optional(Type.Array(Type.String(), { description: "Arguments, one per element" })),
			input: Type.Optional(Type.String({ description: "Text piped to the command's stdin" })),
		}),

		async execute(_toolCallId, params, _onUpdate, ctx, signal) {
			const { command, args = [], input } = params;

			if (!registry.get(command)) {
				const names = registry.names();
				return {
					content: [
						{
							type: "text",
							text: `"${command}" is not imported. Imported: ${names.length > 0 ? names.join(", ") : "(none)"}`,
						},
					],
					details: { command, exitCode: null },
					isError: true,
				};
			}

			const chunks: Buffer[] = [];
			let exitCode: number | null;
			try {
				exitCode = await invoker.invokeStreaming(command, args, {
					input,
					cwd: ctx.cwd,
					onData: (data) => chunks.push(data),
					signal,
				});
			} catch (err) {
				return {
					content: [{ type: "text", text: err instanceof Error ? err.message : String(err) }],
					details: { command, exitCode: null },
					isError: true,
				};
			}

			const output = Buffer.concat(chunks).toString("utf-8");
			const truncation = truncateTail(output, { maxLines: DEFAULT_MAX_LINES, maxBytes: DEFAULT_MAX_BYTES });
			let text = truncation.content || "(no output)";
			if (truncation.truncated) {
				text += `\n\n[Truncated: showing last ${truncation.outputLines} of ${truncation.totalLines} lines]`;
			}
			if (exitCode !== 0) {
				text += `\n\nExit code: ${exitCode}`;
			}

			return { content: [{ type: "text", text }], details: { command, exitCode } };
		},
	});

	pi.registerCommand("wsl-import", {
		description: "Import commands to run in WSL",
		handler: async (args, ctx) => {
			const names = parseCommandList(args);
			if (names.length === 0) {
				ctx.ui.notify("Usage: /wsl-import <command> [command...]", "warning");
				return;
			}
			importCommands(names, ctx);
			ctx.ui.notify(`Imported: ${names.join(", ")}`, "info");
		},
	});

	pi.registerCommand("wsl", {
		description: "Show WSL interop configuration",
		handler: async (_args, ctx) => {
			const config = getConfig();
			if (!store.loaded) store.load();

			const defaults = Array.from(config.defaultParameters.values, ([name, value]) => `${name}: ${value}`);
			const environment = Array.from(config.environmentVariables, ([name, value]) => `${name}=${value}`);
			const functions = store.entries().map(([name, fn]) => `${name}: ${fn}`);

			const lines = [
				"WSL Interop:",
				"",
				`Commands: ${registry.names().join(", ") || "(none)"}`,
				`Distribution: ${config.distribution ?? "(default)"}`,
				"",
				`Default parameters${config.defaultParameters.disabled ? " (disabled)" : ""}:`,
				...(defaults.length > 0 ? defaults.map((line) => `  ${line}`) : ["  (none)"]),
				"",
				"Environment:",
				...(environment.length > 0 ? environment.map((line) => `  ${line}`) : ["  (none)"]),
				"",
				`Completion functions (${store.path}):`,
				...(functions.length > 0 ? functions.map((line) => `  ${line}`) : ["  (none)"]),
			];
			ctx.ui.notify(lines.join("\n"), "info");
		},
	});
}
