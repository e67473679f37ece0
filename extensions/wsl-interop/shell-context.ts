const SHELL_PREFIX = /^\s*!!?/;

export interface ShellCompletionContext {
	/** Everything after `!`/`!!`, leading spaces kept so offsets stay aligned. */
	commandLine: string;
	commandCursor: number;
}

/**
 * Shell-mode lines are the only ones an imported command can be completed on.
 * Returns null for chat lines and while the cursor is still inside the prefix.
 */
export function getShellCompletionContext(currentLine: string, cursorCol: number): ShellCompletionContext | null {
	const prefix = SHELL_PREFIX.exec(currentLine);
	if (!prefix || cursorCol < prefix[0].length) {
		return null;
	}

	const commandLine = currentLine.slice(prefix[0].length);
	return {
		commandLine,
		commandCursor: Math.min(cursorCol, currentLine.length) - prefix[0].length,
	};
}
