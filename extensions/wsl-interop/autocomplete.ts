/**
 * Editor integration.
 *
 * Tab on a shell-mode line (`!grep --col`) whose command was imported asks
 * WSL for completions; the candidates replace the word under the cursor.
 * Chat lines, host commands, and lines WSL has nothing for fall through to
 * the editor's own provider. Without a working wsl.exe the error is handed
 * to `onBridgeError` and the host provider answers instead.
 */

import { CustomEditor, type KeybindingsManager } from "@mariozechner/pi-coding-agent";
import {
	type AutocompleteItem,
	type AutocompleteProvider,
	CombinedAutocompleteProvider,
	type EditorTheme,
	type TUI,
} from "@mariozechner/pi-tui";

import { BridgeUnavailableError } from "./bridge.js";
import type { CommandRegistry } from "./registry.js";
import { getShellCompletionContext } from "./shell-context.js";

type Suggestions = { items: AutocompleteItem[]; prefix: string };

export interface WslCompletionOptions {
	registry: CommandRegistry;
	onBridgeError: (err: BridgeUnavailableError) => void;
}

export class WslAutocompleteProvider implements AutocompleteProvider {
	private host: AutocompleteProvider;
	private options: WslCompletionOptions;

	constructor(host: AutocompleteProvider, options: WslCompletionOptions) {
		this.host = host;
		this.options = options;
	}

	getSuggestions(lines: string[], cursorLine: number, cursorCol: number): Suggestions | null {
		return this.completeImported(lines[cursorLine] ?? "", cursorCol) ?? this.host.getSuggestions(lines, cursorLine, cursorCol);
	}

	// Candidates are inserted the same way as host ones
	applyCompletion(
		lines: string[],
		cursorLine: number,
		cursorCol: number,
		item: AutocompleteItem,
		prefix: string,
	): { lines: string[]; cursorLine: number; cursorCol: number } {
		return this.host.applyCompletion(lines, cursorLine, cursorCol, item, prefix);
	}

	private completeImported(line: string, cursorCol: number): Suggestions | null {
		const shell = getShellCompletionContext(line, cursorCol);
		if (!shell) return null;

		try {
			const result = this.options.registry.complete(shell.commandLine, shell.commandCursor);
			if (!result || result.candidates.length === 0) return null;
			return { items: result.candidates, prefix: result.word };
		} catch (err) {
			if (!(err instanceof BridgeUnavailableError)) throw err;
			this.options.onBridgeError(err);
			return null;
		}
	}
}

export class WslCompletionEditor extends CustomEditor {
	private options: WslCompletionOptions;

	constructor(_tui: TUI, theme: EditorTheme, keybindings: KeybindingsManager, options: WslCompletionOptions) {
		super(theme, keybindings);
		this.options = options;
	}

	setAutocompleteProvider(provider: AutocompleteProvider): void {
		super.setAutocompleteProvider(
			provider instanceof CombinedAutocompleteProvider ? new WslAutocompleteProvider(provider, this.options) : provider,
		);
	}
}
