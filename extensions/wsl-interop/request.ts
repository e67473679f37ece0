import { shellQuote } from "./format.js";
import type { RemoteRequest } from "./types.js";

const ENVIRONMENT_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Serialize a remote request into bridge words.
 *
 * Statements are separated by a lone `;` word. Environment values are
 * single-quoted; argv words are passed through as they are, so callers
 * format them first (an empty argument arrives as `''`).
 */
export function serializeRequest(request: RemoteRequest): string[] {
	const command: string[] = [];

	for (const [name, value] of request.environment ?? []) {
		if (!ENVIRONMENT_NAME.test(name)) {
			throw new Error(`Invalid environment variable name: ${name}`);
		}
		command.push(`${name}=${shellQuote(value)}`);
	}
	command.push(...request.argv);

	const statements: string[][] = [
		...(request.preamble ?? []).filter((statement) => statement.length > 0).map((statement) => [statement]),
		command,
		...(request.epilogue ?? []).filter((statement) => statement.length > 0).map((statement) => [statement]),
	].filter((statement) => statement.length > 0);

	const words: string[] = [];
	for (const statement of statements) {
		if (words.length > 0) words.push(";");
		words.push(...statement);
	}
	return words;
}
