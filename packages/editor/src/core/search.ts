import type { EditorKeybindingsManager, KeyEvent } from "@tilde/tui";
import { rxToCx } from "./row.js";
import type { TextBuffer } from "./text-buffer.js";
import type { Viewport, ViewportSnapshot } from "./viewport.js";

export type SearchDirection = 1 | -1;

export const SEARCH_PROMPT = "Search: %s (Use ESC/Arrows/Enter)";

/**
 * 一次增量搜索的状态。只在搜索提示存在期间有效。
 *
 * 进入时保存光标和滚动位置；每次按键后调用 `step()`；提示结束时调用
 * `commit()` 保留当前位置，或 `cancel()` 精确恢复保存的位置。
 */
export class SearchSession {
	private readonly saved: ViewportSnapshot;
	private _lastMatchRow = -1;
	private _direction: SearchDirection = 1;
	private _state: "prompting" | "committed" | "cancelled" = "prompting";

	constructor(
		private readonly buffer: TextBuffer,
		private readonly viewport: Viewport,
		private readonly keybindings: EditorKeybindingsManager,
	) {
		this.saved = viewport.snapshot();
	}

	get lastMatchRow(): number {
		return this._lastMatchRow;
	}

	get direction(): SearchDirection {
		return this._direction;
	}

	get state(): "prompting" | "committed" | "cancelled" {
		return this._state;
	}

	/**
	 * 处理提示中的一次按键，返回匹配到的行（未匹配返回 -1）。
	 */
	step(query: string, key: KeyEvent): number {
		const bindings = this.keybindings;
		if (bindings.matches(key, "promptSubmit") || bindings.matches(key, "promptCancel")) {
			this._lastMatchRow = -1;
			this._direction = 1;
			return -1;
		}

		if (isForward(key)) {
			this._direction = 1;
		} else if (isBackward(key)) {
			this._direction = -1;
		} else {
			this._lastMatchRow = -1;
			this._direction = 1;
		}

		return this.findNext(query);
	}

	commit(): void {
		this._state = "committed";
	}

	cancel(): void {
		this.viewport.restore(this.saved);
		this._state = "cancelled";
	}

	private findNext(query: string): number {
		if (this._lastMatchRow === -1) {
			this._direction = 1;
		}

		const numrows = this.buffer.numrows;
		let current = this._lastMatchRow;
		for (let i = 0; i < numrows; i++) {
			current += this._direction;
			if (current === -1) {
				current = numrows - 1;
			} else if (current === numrows) {
				current = 0;
			}

			const row = this.buffer.row(current);
			if (!row) continue;
			const offset = row.render.indexOf(query);
			if (offset !== -1) {
				this._lastMatchRow = current;
				this.viewport.cy = current;
				this.viewport.cx = rxToCx(row, offset);
				this.viewport.forceTop(this.buffer);
				return current;
			}
		}
		return -1;
	}
}

function isForward(key: KeyEvent): boolean {
	return key.type === "named" && (key.name === "right" || key.name === "down");
}

function isBackward(key: KeyEvent): boolean {
	return key.type === "named" && (key.name === "left" || key.name === "up");
}
