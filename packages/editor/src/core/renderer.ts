import { ansi } from "@tilde/tui";
import type { TextBuffer } from "./text-buffer.js";
import type { Viewport } from "./viewport.js";

/** 状态栏中文件名的最大长度 */
const FILENAME_WIDTH = 20;

export interface StatusMessage {
	text: string;
	/** 设置消息时的时间戳（毫秒） */
	time: number;
}

export interface FrameState {
	buffer: TextBuffer;
	viewport: Viewport;
	filename?: string;
	status: StatusMessage;
	/** 当前时间（毫秒） */
	now: number;
	/** 消息的显示时长（毫秒） */
	messageTimeoutMs: number;
	/** 缓冲区为空时居中显示的欢迎语 */
	welcome: string;
}

/**
 * 输出接收端，每帧只调用一次 `write`
 */
export interface OutputSink {
	write(data: string): void;
}

function drawRows(state: FrameState): string {
	const { buffer, viewport, welcome } = state;
	const { screenrows, screencols, rowoff, coloff } = viewport;
	let out = "";

	for (let y = 0; y < screenrows; y++) {
		const row = buffer.row(y + rowoff);
		if (row) {
			out += row.render.slice(coloff, coloff + screencols);
		} else if (buffer.numrows === 0 && y === Math.floor(screenrows / 3)) {
			const caption = welcome.slice(0, screencols);
			let padding = Math.floor((screencols - caption.length) / 2);
			if (padding > 0) {
				out += "~";
				padding--;
			}
			out += " ".repeat(padding) + caption;
		} else {
			out += "~";
		}

		out += `${ansi.ERASE_LINE}\r\n`;
	}

	return out;
}

function drawStatusBar(state: FrameState): string {
	const { buffer, viewport, filename } = state;
	const { screencols } = viewport;

	const name = (filename ?? "[No Name]").slice(0, FILENAME_WIDTH);
	const modified = buffer.dirty > 0 ? " (modified)" : "";
	const left = `${name} - ${buffer.numrows} lines${modified}`.slice(0, screencols);
	const right = `${viewport.cy + 1}/${buffer.numrows}`;

	let bar = left;
	let len = left.length;
	while (len < screencols) {
		// 右侧指示器只有在恰好能放下时才绘制
		if (screencols - len === right.length) {
			bar += right;
			break;
		}
		bar += " ";
		len++;
	}

	return `${ansi.INVERSE_ON}${bar}${ansi.INVERSE_OFF}\r\n`;
}

function drawMessageBar(state: FrameState): string {
	const { status, now, messageTimeoutMs, viewport } = state;
	let out = ansi.ERASE_LINE;
	const text = status.text.slice(0, viewport.screencols);
	if (text.length > 0 && now - status.time < messageTimeoutMs) {
		out += text;
	}
	return out;
}

/**
 * 组合一整帧：隐藏光标、重绘文本区域、状态栏和消息栏、定位并显示光标。
 * 调用前必须先执行 `viewport.scroll()`。
 */
export function renderFrame(state: FrameState): string {
	const { viewport } = state;
	let frame = ansi.HIDE_CURSOR + ansi.CURSOR_HOME;
	frame += drawRows(state);
	frame += drawStatusBar(state);
	frame += drawMessageBar(state);
	frame += ansi.cursorTo(viewport.cy - viewport.rowoff + 1, viewport.rx - viewport.coloff + 1);
	frame += ansi.SHOW_CURSOR;
	return frame;
}

/**
 * 把帧一次性写入输出，避免闪烁。
 */
export class Renderer {
	private readonly sink: OutputSink;
	private frames = 0;

	constructor(sink: OutputSink) {
		this.sink = sink;
	}

	get frameCount(): number {
		return this.frames;
	}

	render(state: FrameState): void {
		state.viewport.scroll(state.buffer);
		this.sink.write(renderFrame(state));
		this.frames++;
	}
}
