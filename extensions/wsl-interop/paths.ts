import { existsSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";

import { BridgeUnavailableError } from "./bridge.js";
import { formatArgument } from "./format.js";
import type { Bridge } from "./types.js";

const DRIVE_QUALIFIED = /^[A-Za-z]:[\\/]/;
const GLOB_CHARACTERS = /[*?[\]]/;

export interface PathTranslationOptions {
	bridge: Bridge;
	/** Directory relative tokens are checked against. */
	cwd: string;
	exists?: (path: string) => boolean;
}

export type PathKind = "qualified" | "relative" | "plain";

function toForwardSlashes(value: string): string {
	return value.replace(/\\/g, "/");
}

export function classifyPath(token: string, cwd: string, exists: (path: string) => boolean = existsSync): PathKind {
	if (DRIVE_QUALIFIED.test(token)) {
		return "qualified";
	}

	if (!token || GLOB_CHARACTERS.test(token) || isAbsolute(token)) {
		return "plain";
	}

	try {
		return exists(resolve(cwd, toForwardSlashes(token))) ? "relative" : "plain";
	} catch {
		return "plain";
	}
}

/**
 * Rewrite a host path argument into its WSL form, formatted for execution.
 * Arguments that are not paths are only formatted.
 */
export function translatePathIfApplicable(token: string, options: PathTranslationOptions): string {
	const kind = classifyPath(token, options.cwd, options.exists);

	if (kind === "qualified") {
		const windowsPath = toForwardSlashes(token);
		try {
			return formatArgument(toForwardSlashes(options.bridge.pathmap(windowsPath)));
		} catch (err) {
			if (err instanceof BridgeUnavailableError) throw err;
			return formatArgument(windowsPath);
		}
	}

	if (kind === "relative") {
		return formatArgument(toForwardSlashes(token));
	}

	return formatArgument(token);
}
