/**
 * Config files (merged, project takes precedence):
 * - ~/.pi/agent/wsl-interop.json (global)
 * - <cwd>/.pi/wsl-interop.json (project-local)
 *
 * {
 *   "commands": ["grep", "ls", "seq"],
 *   "defaultParameters": { "grep": "--color=auto", "Disabled": false },
 *   "environmentVariables": { "LANG": "C.UTF-8" },
 *   "distribution": "Ubuntu"
 * }
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import type { DefaultParameters, InteropConfig } from "./types.js";

/** Reserved default-parameter key that turns off default arguments for every command. */
export const DISABLED_KEY = "Disabled";

export const configFileSchema = Type.Object({
	commands: Type.Optional(Type.Array(Type.String())),
	defaultParameters: Type.Optional(Type.Record(Type.String(), Type.Union([Type.String(), Type.Boolean()]))),
	environmentVariables: Type.Optional(Type.Record(Type.String(), Type.String())),
	distribution: Type.Optional(Type.String()),
	bridgeExecutable: Type.Optional(Type.String()),
});

export type ConfigFile = Static<typeof configFileSchema>;

export const DEFAULT_CONFIG: InteropConfig = {
	commands: [],
	defaultParameters: { disabled: false, values: new Map() },
	environmentVariables: new Map(),
	bridgeExecutable: "wsl.exe",
};

export function globalConfigPath(): string {
	return join(homedir(), ".pi", "agent", "wsl-interop.json");
}

export function projectConfigPath(cwd: string): string {
	return join(cwd, ".pi", "wsl-interop.json");
}

export function parseDefaultParameters(raw: Record<string, string | boolean>): DefaultParameters {
	const values = new Map<string, string>();
	let disabled = false;

	for (const [key, value] of Object.entries(raw)) {
		if (key === DISABLED_KEY) {
			disabled = value === true || (typeof value === "string" && value.length > 0 && value !== "false");
		} else if (typeof value === "string") {
			values.set(key, value);
		}
	}

	return { disabled, values };
}

/** Default argument string for a command, or undefined when none applies. */
export function defaultArgumentsFor(table: DefaultParameters, command: string): string | undefined {
	if (table.disabled) return undefined;
	return table.values.get(command);
}

export function mergeConfig(base: InteropConfig, overrides: ConfigFile): InteropConfig {
	const result: InteropConfig = { ...base };

	if (overrides.commands) {
		result.commands = Array.from(new Set([...base.commands, ...overrides.commands]));
	}
	if (overrides.defaultParameters) {
		const parsed = parseDefaultParameters(overrides.defaultParameters);
		result.defaultParameters = {
			disabled: DISABLED_KEY in overrides.defaultParameters ? parsed.disabled : base.defaultParameters.disabled,
			values: new Map([...base.defaultParameters.values, ...parsed.values]),
		};
	}
	if (overrides.environmentVariables) {
		result.environmentVariables = new Map([
			...base.environmentVariables,
			...Object.entries(overrides.environmentVariables),
		]);
	}
	if (overrides.distribution !== undefined) result.distribution = overrides.distribution;
	if (overrides.bridgeExecutable !== undefined) result.bridgeExecutable = overrides.bridgeExecutable;

	return result;
}

/** Parse one config file's text. Returns undefined (and warns) when it is unusable. */
export function parseConfig(text: string, source: string): ConfigFile | undefined {
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (e) {
		console.error(`Warning: Could not parse ${source}: ${e}`);
		return undefined;
	}

	if (!Value.Check(configFileSchema, raw)) {
		const first = Value.Errors(configFileSchema, raw).First();
		console.error(`Warning: Ignoring ${source}: ${first ? `${first.path} ${first.message}` : "invalid config"}`);
		return undefined;
	}

	return raw;
}

function readConfigFile(path: string): ConfigFile | undefined {
	if (!existsSync(path)) return undefined;
	return parseConfig(readFileSync(path, "utf-8"), path);
}

export function loadConfig(cwd: string): InteropConfig {
	let config = DEFAULT_CONFIG;
	for (const path of [globalConfigPath(), projectConfigPath(cwd)]) {
		const file = readConfigFile(path);
		if (file) config = mergeConfig(config, file);
	}
	return config;
}
