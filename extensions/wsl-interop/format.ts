/**
 * Argument formatting for the remote shell.
 *
 * Execution mode escapes with a backslash so bash receives a literal.
 * Interactive mode escapes with a backtick, the calling line's own escape
 * character, so text inserted from a completion menu survives the editor.
 */

const SPECIAL_CHARACTERS = " ,(){}|;";

function isQuoted(arg: string): boolean {
	if (arg.length < 2) return false;
	const first = arg[0];
	return (first === "'" || first === '"') && arg[arg.length - 1] === first;
}

function escapeSpecials(arg: string, escape: string): string {
	let result = "";
	for (let i = 0; i < arg.length; i++) {
		const ch = arg[i];
		if (SPECIAL_CHARACTERS.includes(ch) && arg[i - 1] !== escape) {
			result += escape;
		}
		result += ch;
	}
	return result;
}

export function formatArgument(arg: string, interactive = false): string {
	const trimmed = arg.trim();

	if (!trimmed) {
		return "''";
	}

	if (isQuoted(trimmed)) {
		return trimmed;
	}

	if (interactive && trimmed.includes(" ")) {
		return `'${trimmed}'`;
	}

	// \n in a sed expression must reach bash as \\n
	const backslashed = trimmed.replace(/(?<!\\)\\(?=[A-Za-z0-9])/g, "\\\\");
	return escapeSpecials(backslashed, interactive ? "`" : "\\");
}

/** Single-quote a value for bash. */
export function shellQuote(value: string): string {
	return `'${value.replace(/'/g, "'\\''")}'`;
}
