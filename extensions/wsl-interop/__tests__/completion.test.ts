import { describe, it, expect } from "vitest";
import { CompletionFunctionResolver, MemoryCompletionFunctionStore } from "../completion-functions.js";
import {
	buildCompletionRequest,
	complete,
	parseCompletionOutput,
	resolveCursorContext,
	toCandidates,
} from "../completion.js";
import { tokenize } from "../tokenize.js";
import { FakeBridge } from "./fake-bridge.js";

function contextFor(line: string, cursor: number) {
	return resolveCursorContext(line, tokenize(line), cursor);
}

describe("resolveCursorContext", () => {
	it("edits the word the cursor is inside", () => {
		expect(contextFor("tar -x archive.tar", 10)).toEqual({
			index: 2,
			previousWord: "-x",
			word: "arc",
			line: "tar -x archive.tar",
			words: ["tar", "-x", "archive.tar"],
			point: 10,
		});
	});

	it("edits the word the cursor sits directly after", () => {
		const context = contextFor("git comm", 8);
		expect(context?.index).toBe(1);
		expect(context?.previousWord).toBe("git");
		expect(context?.word).toBe("comm");
	});

	it("edits a new trailing word past the end of the line", () => {
		expect(contextFor("seq 0 10 ", 9)).toEqual({
			index: 3,
			previousWord: "10",
			word: "",
			line: "seq 0 10 ",
			words: ["seq", "0", "10", ""],
			point: 9,
		});
	});

	it("puts the edited index at the token count for a cursor at end of line after whitespace", () => {
		// A cursor directly after a word still edits that word; only whitespace opens a new one
		expect(contextFor("seq 0 10 ", 9)?.index).toBe(3);
		expect(contextFor("seq 0 10", 8)?.index).toBe(2);
		expect(contextFor("seq 0 10", 8)?.word).toBe("10");
	});

	it("edits the following word's slot from the whitespace before it", () => {
		const context = contextFor("git  status", 4);
		expect(context?.index).toBe(1);
		expect(context?.previousWord).toBe("git");
		expect(context?.word).toBe("");
	});

	it("completes nothing on the command name or an empty line", () => {
		expect(contextFor("git", 2)).toBeUndefined();
		expect(contextFor("git status", 3)).toBeUndefined();
		expect(contextFor("", 0)).toBeUndefined();
	});

	it("merges a quoted path with its unquoted continuation", () => {
		const line = "ls -l '/mnt/c/Program Files'/Win";
		expect(contextFor(line, line.length)).toEqual({
			index: 2,
			previousWord: "-l",
			word: "'/mnt/c/Program Files'/Win",
			line,
			words: ["ls", "-l", "'/mnt/c/Program Files'/Win"],
			point: line.length,
		});
	});

	it("does not merge a path separated by whitespace", () => {
		const context = contextFor("ls 'a b' /Win", 13);
		expect(context?.index).toBe(2);
		expect(context?.previousWord).toBe("'a b'");
		expect(context?.word).toBe("/Win");
	});
});

describe("buildCompletionRequest", () => {
	it("sets the completion variables and calls the function", () => {
		const context = contextFor("git comm", 8);
		if (!context) throw new Error("expected a context");

		const request = buildCompletionRequest("git", "__git_wrap__git_main", context);

		expect(request.preamble?.slice(2)).toEqual([
			"COMP_LINE='git comm'",
			"COMP_WORDS=('git' 'comm')",
			"COMP_CWORD=1",
			"COMP_POINT=8",
			"bind 'set completion-ignore-case on' 2> /dev/null",
		]);
		expect(request.argv).toEqual(["__git_wrap__git_main", "'git'", "'comm'", "'git'", "2> /dev/null"]);
		expect(request.epilogue).toEqual(["IFS=$'\\n'", 'echo "${COMPREPLY[*]}"']);
	});

	it("quotes words that carry their own quotes", () => {
		const line = "ls '/mnt/c/Program Files'/W";
		const context = contextFor(line, line.length);
		if (!context) throw new Error("expected a context");

		const request = buildCompletionRequest("ls", "_longopt", context);

		expect(request.preamble?.[3]).toBe("COMP_WORDS=('ls' ''\\''/mnt/c/Program Files'\\''/W')");
	});
});

describe("parseCompletionOutput", () => {
	it("drops empty lines and duplicates", () => {
		expect(parseCompletionOutput("status\n\nstash\nstatus\r\n")).toEqual(["stash", "status"]);
	});

	it("keeps case variants next to each other", () => {
		expect(parseCompletionOutput("-b\n-a\n-B\n-A\n")).toEqual(["-A", "-a", "-B", "-b"]);
	});
});

describe("toCandidates", () => {
	it("marks case-only collisions in the label", () => {
		expect(toCandidates(parseCompletionOutput("-a\n-A\n"), "-", new Set())).toEqual([
			{ value: "-A", label: "-A" },
			{ value: "-a", label: "-a " },
		]);
	});

	it("quotes candidates containing spaces", () => {
		expect(toCandidates(["/mnt/c/Program Files/"], "/mnt/c/Pro", new Set())).toEqual([
			{ value: "'/mnt/c/Program Files/'", label: "'/mnt/c/Program Files/'" },
		]);
	});

	it("keeps the option part of name=value words", () => {
		expect(toCandidates(["always", "auto"], "--color=a", new Set(["--color=always"]))).toEqual([
			{ value: "--color=always", label: "always" },
			{ value: "--color=auto", label: "auto" },
		]);
	});

	it("drops candidates already on the line", () => {
		expect(toCandidates(["-a", "-l"], "-", new Set(["ls", "-l"]))).toEqual([{ value: "-a", label: "-a" }]);
	});
});

describe("complete", () => {
	function gitBridge(): FakeBridge {
		return new FakeBridge((line) => {
			if (line.includes("complete -p 'git'")) {
				return { stdout: "__git_wrap__git_main\n", stderr: "", exitCode: 0 };
			}
			if (line.includes("COMPREPLY")) {
				return { stdout: "commit\ncommit\n", stderr: "", exitCode: 0 };
			}
			return { stdout: "", stderr: "", exitCode: 1 };
		});
	}

	it("runs the resolved function remotely", () => {
		const bridge = gitBridge();
		const resolver = new CompletionFunctionResolver(bridge, new MemoryCompletionFunctionStore());

		const result = complete("git comm", tokenize("git comm"), 8, { bridge, resolver });

		expect(result).toEqual({ candidates: [{ value: "commit", label: "commit" }], word: "comm" });
		expect(bridge.calls).toHaveLength(2);
		expect(bridge.calls[1].words.join(" ")).toContain(
			"; __git_wrap__git_main 'git' 'comm' 'git' 2> /dev/null ; IFS=$'\\n' ; echo \"${COMPREPLY[*]}\"",
		);
	});

	it("resolves the completion function once across requests", () => {
		const bridge = gitBridge();
		const resolver = new CompletionFunctionResolver(bridge, new MemoryCompletionFunctionStore());

		complete("git comm", tokenize("git comm"), 8, { bridge, resolver });
		complete("git co", tokenize("git co"), 6, { bridge, resolver });

		expect(bridge.calls).toHaveLength(3);
	});

	it("returns nothing for an empty line", () => {
		const bridge = gitBridge();
		const resolver = new CompletionFunctionResolver(bridge, new MemoryCompletionFunctionStore());

		expect(complete("", [], 0, { bridge, resolver })).toBeUndefined();
		expect(bridge.calls).toHaveLength(0);
	});
});
