/**
 * Remote bash statements for driving programmable completion.
 *
 * The framework is sourced from the first readable of the usual
 * bash-completion locations; per-command definitions are then loaded on
 * demand with whichever loader that framework version provides.
 */

import { shellQuote } from "./format.js";

/** Completion function that completes file system paths only. */
export const FALLBACK_COMPLETION_FUNCTION = "_minimal";

const BASH_COMPLETION_CANDIDATES = [
	"/usr/share/bash-completion/bash_completion",
	"/usr/local/share/bash-completion/bash_completion",
	"/etc/bash_completion",
	"/usr/local/etc/profile.d/bash_completion.sh",
];

export function sourceBashCompletion(): string {
	const candidates = BASH_COMPLETION_CANDIDATES.map(shellQuote).join(" ");
	return `for f in ${candidates}; do if [[ -r "$f" ]]; then . "$f" 2> /dev/null; break; fi; done`;
}

export function loadCommandCompletion(command: string): string {
	const quoted = shellQuote(command);
	return (
		`if type __load_completion &> /dev/null; then __load_completion ${quoted} 2> /dev/null; ` +
		`elif type _completion_loader &> /dev/null; then _completion_loader ${quoted} 2> /dev/null; fi`
	);
}

export const IGNORE_CASE = "bind 'set completion-ignore-case on' 2> /dev/null";

export const PRINT_COMPREPLY = ["IFS=$'\\n'", 'echo "${COMPREPLY[*]}"'];

/** `complete -p` output reduced to the `-F` function name. */
export function printCompletionFunctionWords(command: string): string[] {
	return ["complete", "-p", shellQuote(command), "2> /dev/null", "|", "sed", "-E", "'s/^complete.*-F ([^ ]+).*$/\\1/'"];
}
