export const DEFAULT_TAB_STOP = 8;

/**
 * 缓冲区中的一个逻辑行。
 *
 * `chars` 是权威内容（每个字符对应一个字节），`render` 是展开制表符后的
 * 派生内容。所有对 `chars` 的修改都经过本类的方法，并在返回前重新生成
 * `render`。
 */
export class Row {
	private _chars: string;
	private _render = "";
	readonly tabStop: number;

	constructor(chars: string, tabStop: number = DEFAULT_TAB_STOP) {
		this._chars = chars;
		this.tabStop = tabStop;
		this.update();
	}

	get chars(): string {
		return this._chars;
	}

	get render(): string {
		return this._render;
	}

	get size(): number {
		return this._chars.length;
	}

	/** 在 `at` 处插入一个字符，越界时追加到行尾 */
	insertChar(at: number, c: string): void {
		const index = at < 0 || at > this._chars.length ? this._chars.length : at;
		this.setChars(this._chars.slice(0, index) + c + this._chars.slice(index));
	}

	/** 删除 `at` 处的字符，越界时不做任何事 */
	deleteChar(at: number): void {
		if (at < 0 || at >= this._chars.length) return;
		this.setChars(this._chars.slice(0, at) + this._chars.slice(at + 1));
	}

	append(text: string): void {
		this.setChars(this._chars + text);
	}

	/** 截断到 `[0, at)` 并返回被截掉的部分 */
	truncate(at: number): string {
		const tail = this._chars.slice(at);
		this.setChars(this._chars.slice(0, at));
		return tail;
	}

	private setChars(chars: string): void {
		this._chars = chars;
		this.update();
	}

	private update(): void {
		let render = "";
		for (const ch of this._chars) {
			if (ch === "\t") {
				render += " ";
				while (render.length % this.tabStop !== 0) render += " ";
			} else {
				render += ch;
			}
		}
		this._render = render;
	}
}

/**
 * 缓冲区列 `cx` 对应的渲染列。
 */
export function cxToRx(row: Row, cx: number): number {
	const chars = row.chars;
	let rx = 0;
	for (let j = 0; j < cx && j < chars.length; j++) {
		if (chars[j] === "\t") {
			rx += row.tabStop - 1 - (rx % row.tabStop);
		}
		rx++;
	}
	return rx;
}

/**
 * 渲染列 `rx` 对应的缓冲区列。`rx` 超出行尾时返回行长度。
 */
export function rxToCx(row: Row, rx: number): number {
	const chars = row.chars;
	let curRx = 0;
	for (let cx = 0; cx < chars.length; cx++) {
		if (chars[cx] === "\t") {
			curRx += row.tabStop - 1 - (curRx % row.tabStop);
		}
		curRx++;
		if (curRx > rx) return cx;
	}
	return chars.length;
}
