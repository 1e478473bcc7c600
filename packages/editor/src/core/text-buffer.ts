import { DEFAULT_TAB_STOP, Row } from "./row.js";

export const LINE_TERMINATOR = "\n";

export interface CursorPosition {
	cx: number;
	cy: number;
}

/**
 * 按行组织的文本缓冲区。唯一拥有所有 Row。
 *
 * 修改光标位置的操作返回新的 `{ cx, cy }`；越界的操作不做任何事并原样返回
 * 光标。`dirty` 在每次内容修改时递增，只有加载和保存会把它清零。
 */
export class TextBuffer {
	private rows: Row[] = [];
	private _dirty = 0;
	readonly tabStop: number;

	constructor(tabStop: number = DEFAULT_TAB_STOP) {
		this.tabStop = tabStop;
	}

	/** 从行内容创建缓冲区（dirty 为 0） */
	static fromLines(lines: readonly string[], tabStop?: number): TextBuffer {
		const buffer = new TextBuffer(tabStop);
		buffer.load(lines);
		return buffer;
	}

	get numrows(): number {
		return this.rows.length;
	}

	get dirty(): number {
		return this._dirty;
	}

	/** 保存成功后调用 */
	markClean(): void {
		this._dirty = 0;
	}

	row(at: number): Row | undefined {
		return this.rows[at];
	}

	lines(): string[] {
		return this.rows.map((row) => row.chars);
	}

	/** 用给定的行替换全部内容，完成后 dirty 清零 */
	load(lines: readonly string[]): void {
		this.rows = [];
		for (const line of lines) {
			this.insertRow(this.rows.length, line);
		}
		this._dirty = 0;
	}

	insertRow(at: number, content: string): void {
		if (at < 0 || at > this.rows.length) return;
		this.rows.splice(at, 0, new Row(content, this.tabStop));
		this._dirty++;
	}

	deleteRow(at: number): void {
		if (at < 0 || at >= this.rows.length) return;
		this.rows.splice(at, 1);
		this._dirty++;
	}

	/**
	 * 在光标处插入字符。光标位于最后一行之后时先追加一个空行。
	 */
	insertChar(cy: number, cx: number, c: string): CursorPosition {
		if (cy === this.rows.length) {
			this.insertRow(this.rows.length, "");
		}
		const row = this.rows[cy];
		if (!row) return { cx, cy };
		row.insertChar(cx, c);
		this._dirty++;
		return { cx: cx + 1, cy };
	}

	/**
	 * 在光标处断行。`cx` 为 0 时在当前行之前插入空行，否则拆分当前行。
	 */
	insertNewline(cy: number, cx: number): CursorPosition {
		if (cx === 0) {
			this.insertRow(cy, "");
		} else {
			const row = this.rows[cy];
			if (!row) return { cx, cy };
			const tail = row.truncate(cx);
			this.insertRow(cy + 1, tail);
		}
		return { cx: 0, cy: cy + 1 };
	}

	/**
	 * 删除光标左侧的字符。位于行首时把当前行并入上一行。
	 */
	deleteChar(cy: number, cx: number): CursorPosition {
		if (cy === this.rows.length) return { cx, cy };
		if (cx === 0 && cy === 0) return { cx, cy };

		const row = this.rows[cy];
		if (!row) return { cx, cy };

		if (cx > 0) {
			row.deleteChar(cx - 1);
			this._dirty++;
			return { cx: cx - 1, cy };
		}

		const previous = this.rows[cy - 1];
		if (!previous) return { cx, cy };
		const joinAt = previous.size;
		previous.append(row.chars);
		this._dirty++;
		this.deleteRow(cy);
		return { cx: joinAt, cy: cy - 1 };
	}

	/** 每行内容后追加换行符 */
	rowsToFlatText(): string {
		let text = "";
		for (const row of this.rows) {
			text += row.chars + LINE_TERMINATOR;
		}
		return text;
	}
}
