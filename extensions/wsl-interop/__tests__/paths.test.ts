import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { BridgeUnavailableError } from "../bridge.js";
import { classifyPath, translatePathIfApplicable } from "../paths.js";
import { FakeBridge } from "./fake-bridge.js";

describe("translatePathIfApplicable", () => {
	let cwd: string;
	let bridge: FakeBridge;

	beforeEach(() => {
		cwd = mkdtempSync(join(tmpdir(), "wsl-interop-"));
		mkdirSync(join(cwd, "My Docs"));
		writeFileSync(join(cwd, "My Docs", "notes.txt"), "");
		bridge = new FakeBridge();
		bridge.mounts.set("C:/", "/mnt/c/");
	});

	afterEach(() => {
		rmSync(cwd, { recursive: true, force: true });
	});

	it("maps drive-qualified paths through wslpath", () => {
		expect(translatePathIfApplicable("C:\\Program Files (x86)\\app", { bridge, cwd })).toBe(
			"/mnt/c/Program\\ Files\\ \\(x86\\)/app",
		);
		expect(bridge.pathmapCalls).toEqual(["C:/Program Files (x86)/app"]);
	});

	it("normalizes existing relative paths without asking the bridge", () => {
		expect(translatePathIfApplicable("My Docs\\notes.txt", { bridge, cwd })).toBe("My\\ Docs/notes.txt");
		expect(bridge.pathmapCalls).toEqual([]);
	});

	it("formats anything else as a plain argument", () => {
		expect(translatePathIfApplicable("s/;/\\n/g", { bridge, cwd })).toBe("s/\\;/\\\\n/g");
		expect(translatePathIfApplicable("/usr/share/dict", { bridge, cwd })).toBe("/usr/share/dict");
	});

	it("falls back to plain formatting when wslpath fails", () => {
		expect(translatePathIfApplicable("Z:\\nowhere", { bridge, cwd })).toBe("Z:/nowhere");
	});

	it("propagates a missing bridge", () => {
		const missing = new FakeBridge();
		missing.pathmap = () => {
			throw new BridgeUnavailableError("wsl.exe", new Error("spawn wsl.exe ENOENT"));
		};
		expect(() => translatePathIfApplicable("C:\\Users", { bridge: missing, cwd })).toThrow(BridgeUnavailableError);
	});
});

describe("classifyPath", () => {
	const cwd = "/work";

	it("recognizes drive qualifiers with either separator", () => {
		expect(classifyPath("C:\\Users", cwd)).toBe("qualified");
		expect(classifyPath("d:/data", cwd)).toBe("qualified");
		expect(classifyPath("C:", cwd)).toBe("plain");
	});

	it("never checks glob patterns", () => {
		let checked = false;
		const exists = () => {
			checked = true;
			return true;
		};
		expect(classifyPath("*.txt", cwd, exists)).toBe("plain");
		expect(classifyPath("[a-", cwd, exists)).toBe("plain");
		expect(checked).toBe(false);
	});

	it("treats a failing existence check as plain", () => {
		const exists = () => {
			throw new Error("invalid path");
		};
		expect(classifyPath("weird", cwd, exists)).toBe("plain");
	});

	it("checks relative paths against the working directory", () => {
		const seen: string[] = [];
		const exists = (path: string) => {
			seen.push(path);
			return true;
		};
		expect(classifyPath("src", cwd, exists)).toBe("relative");
		expect(seen).toEqual([join("/work", "src")]);
	});
});
