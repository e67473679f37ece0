import { describe, it, expect } from "vitest";
import { commandArguments, tokenize } from "../tokenize.js";

describe("tokenize", () => {
	it("records spans for plain words", () => {
		expect(tokenize("seq 0  10")).toEqual([
			{ text: "seq", value: "seq", start: 0, end: 3 },
			{ text: "0", value: "0", start: 4, end: 5 },
			{ text: "10", value: "10", start: 7, end: 9 },
		]);
	});

	it("returns no tokens for a blank line", () => {
		expect(tokenize("   ")).toEqual([]);
	});

	it("ends a quoted word at its closing quote", () => {
		expect(tokenize("ls '/mnt/c/Program Files'/Win")).toEqual([
			{ text: "ls", value: "ls", start: 0, end: 2 },
			{ text: "'/mnt/c/Program Files'", value: "/mnt/c/Program Files", start: 3, end: 25 },
			{ text: "/Win", value: "/Win", start: 25, end: 29 },
		]);
	});

	it("treats a backtick as an escape", () => {
		const tokens = tokenize('echo a`;b "x `" y" Program` Files');
		expect(tokens.map((token) => token.value)).toEqual(["echo", "a;b", 'x " y', "Program Files"]);
		expect(tokens[1].text).toBe("a`;b");
	});

	it("runs an unterminated quote to the end of the line", () => {
		expect(tokenize("cat 'my fi")).toEqual([
			{ text: "cat", value: "cat", start: 0, end: 3 },
			{ text: "'my fi", value: "my fi", start: 4, end: 10 },
		]);
	});

	it("splits out unquoted operators", () => {
		const tokens = tokenize("cat f|grep 'a|b' >out");
		expect(tokens.map((token) => token.text)).toEqual(["cat", "f", "|", "grep", "'a|b'", ">", "out"]);
		expect(tokens.filter((token) => token.operator).map((token) => token.text)).toEqual(["|", ">"]);
	});
});

describe("commandArguments", () => {
	it("joins tokens that touch", () => {
		expect(commandArguments(tokenize("'/mnt/c/Program Files'/Win x"))).toEqual(["/mnt/c/Program Files/Win", "x"]);
	});

	it("keeps separated tokens apart", () => {
		expect(commandArguments(tokenize("'a b' c"))).toEqual(["a b", "c"]);
	});
});
