import { cxToRx } from "./row.js";
import type { CursorPosition, TextBuffer } from "./text-buffer.js";

export type CursorMove = "up" | "down" | "left" | "right";

export interface ViewportSnapshot {
	cx: number;
	cy: number;
	rowoff: number;
	coloff: number;
}

/**
 * 光标位置和滚动偏移。
 *
 * `cx`/`cy` 是缓冲区坐标，`rx` 是展开制表符后的渲染列，只在 `scroll()` 中
 * 由 `cx` 推导。`screenrows`/`screencols` 是文本区域的大小（不含状态栏和
 * 消息栏）。
 */
export class Viewport {
	cx = 0;
	cy = 0;
	rx = 0;
	rowoff = 0;
	coloff = 0;
	screenrows: number;
	screencols: number;

	constructor(screenrows: number, screencols: number) {
		this.screenrows = screenrows;
		this.screencols = screencols;
	}

	resize(screenrows: number, screencols: number): void {
		this.screenrows = screenrows;
		this.screencols = screencols;
	}

	setCursor(position: CursorPosition): void {
		this.cx = position.cx;
		this.cy = position.cy;
	}

	/**
	 * 每帧渲染前调用：更新 `rx` 并收紧滚动偏移，使光标落在可见窗口内。
	 */
	scroll(buffer: TextBuffer): void {
		const row = buffer.row(this.cy);
		this.rx = row ? cxToRx(row, this.cx) : 0;

		if (this.cy < this.rowoff) {
			this.rowoff = this.cy;
		}
		if (this.cy >= this.rowoff + this.screenrows) {
			this.rowoff = this.cy - this.screenrows + 1;
		}
		if (this.rx < this.coloff) {
			this.coloff = this.rx;
		}
		if (this.rx >= this.coloff + this.screencols) {
			this.coloff = this.rx - this.screencols + 1;
		}
	}

	moveCursor(move: CursorMove, buffer: TextBuffer): void {
		const row = buffer.row(this.cy);

		switch (move) {
			case "left":
				if (this.cx !== 0) {
					this.cx--;
				} else if (this.cy > 0) {
					this.cy--;
					this.cx = buffer.row(this.cy)?.size ?? 0;
				}
				break;
			case "right":
				if (row && this.cx < row.size) {
					this.cx++;
				} else if (row && this.cx === row.size) {
					this.cy++;
					this.cx = 0;
				}
				break;
			case "up":
				if (this.cy !== 0) {
					this.cy--;
				}
				break;
			case "down":
				if (this.cy < buffer.numrows) {
					this.cy++;
				}
				break;
		}

		// 换行后光标列不能超出新行的长度
		const rowlen = buffer.row(this.cy)?.size ?? 0;
		if (this.cx > rowlen) {
			this.cx = rowlen;
		}
	}

	lineStart(): void {
		this.cx = 0;
	}

	lineEnd(buffer: TextBuffer): void {
		const row = buffer.row(this.cy);
		if (row) {
			this.cx = row.size;
		}
	}

	pageUp(buffer: TextBuffer): void {
		this.cy = this.rowoff;
		for (let times = this.screenrows; times > 0; times--) {
			this.moveCursor("up", buffer);
		}
	}

	pageDown(buffer: TextBuffer): void {
		this.cy = Math.min(this.rowoff + this.screenrows - 1, buffer.numrows);
		for (let times = this.screenrows; times > 0; times--) {
			this.moveCursor("down", buffer);
		}
	}

	/** 让下一次 `scroll()` 把光标所在行滚动到窗口顶部 */
	forceTop(buffer: TextBuffer): void {
		this.rowoff = buffer.numrows;
	}

	snapshot(): ViewportSnapshot {
		return { cx: this.cx, cy: this.cy, rowoff: this.rowoff, coloff: this.coloff };
	}

	restore(snapshot: ViewportSnapshot): void {
		this.cx = snapshot.cx;
		this.cy = snapshot.cy;
		this.rowoff = snapshot.rowoff;
		this.coloff = snapshot.coloff;
	}
}
