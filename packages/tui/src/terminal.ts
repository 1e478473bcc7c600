import * as fs from "node:fs";
import { CURSOR_TO_BOTTOM_RIGHT, REQUEST_CURSOR_POSITION } from "./ansi.js";
import { TerminalError } from "./errors.js";
import type { KeyEvent } from "./keys.js";
import { StdinBuffer } from "./stdin-buffer.js";

export interface WindowSize {
	rows: number;
	columns: number;
}

/**
 * 编辑器的最小终端接口
 */
export interface Terminal {
	// 进入原始模式，设置按键和调整大小的处理程序
	start(onKey: (key: KeyEvent) => void, onResize: () => void, onError: (error: Error) => void): void;

	// 恢复原始的终端模式
	stop(): void;

	// 向终端写入输出（一次调用写出一整帧）
	write(data: string): void;

	// 查询终端尺寸
	getWindowSize(): Promise<WindowSize>;
}

export type ProcessTerminalOptions = {
	/** 等待转义序列后续字节的时间（默认：100ms） */
	escapeTimeout?: number;
	/** 光标位置查询的等待时间（默认：1000ms） */
	sizeQueryTimeout?: number;
};

/**
 * 解析光标位置报告 `ESC [ rows ; cols R`
 */
export function parseCursorPositionReport(data: string): WindowSize | undefined {
	const match = data.match(/\x1b\[(\d+);(\d+)R/);
	if (!match) return undefined;
	const rows = Number.parseInt(match[1] ?? "", 10);
	const columns = Number.parseInt(match[2] ?? "", 10);
	if (!Number.isFinite(rows) || !Number.isFinite(columns)) return undefined;
	return { rows, columns };
}

/**
 * 使用 process.stdin/stdout 的真实终端
 */
export class ProcessTerminal implements Terminal {
	private wasRaw = false;
	private started = false;
	private stdinBuffer?: StdinBuffer;
	private stdinDataHandler?: (data: Buffer) => void;
	private stdinErrorHandler?: (error: Error) => void;
	private stdinEndHandler?: () => void;
	private resizeHandler?: () => void;
	private readonly escapeTimeout: number;
	private readonly sizeQueryTimeout: number;
	private writeLogPath = process.env.TILDE_TUI_WRITE_LOG || "";

	constructor(options: ProcessTerminalOptions = {}) {
		this.escapeTimeout = options.escapeTimeout ?? 100;
		this.sizeQueryTimeout = options.sizeQueryTimeout ?? 1000;
	}

	/**
	 * 进入原始模式：关闭回显、行缓冲和信号字符，字节按原样送达。
	 * stdin 不是 TTY 时无法进入原始模式，抛出 TerminalError。
	 */
	enableRawMode(): void {
		if (!process.stdin.isTTY || typeof process.stdin.setRawMode !== "function") {
			throw new TerminalError("setRawMode", new Error("stdin is not a terminal"));
		}
		this.wasRaw = process.stdin.isRaw || false;
		try {
			process.stdin.setRawMode(true);
		} catch (error) {
			throw new TerminalError("setRawMode", error);
		}
		this.started = true;
	}

	start(onKey: (key: KeyEvent) => void, onResize: () => void, onError: (error: Error) => void): void {
		if (!this.started) {
			this.enableRawMode();
		}

		this.stdinBuffer = new StdinBuffer({ timeout: this.escapeTimeout });
		this.stdinBuffer.on("key", onKey);

		this.stdinDataHandler = (data: Buffer) => {
			this.stdinBuffer?.process(data);
		};
		this.stdinErrorHandler = (error: Error) => onError(new TerminalError("read", error));
		this.stdinEndHandler = () => onError(new TerminalError("read", new Error("input stream closed")));
		this.resizeHandler = onResize;

		process.stdin.on("data", this.stdinDataHandler);
		process.stdin.on("error", this.stdinErrorHandler);
		process.stdin.on("end", this.stdinEndHandler);
		process.stdout.on("resize", this.resizeHandler);
		process.stdin.resume();
	}

	stop(): void {
		// 清理 StdinBuffer
		if (this.stdinBuffer) {
			this.stdinBuffer.destroy();
			this.stdinBuffer = undefined;
		}

		// 移除事件处理器
		if (this.stdinDataHandler) {
			process.stdin.removeListener("data", this.stdinDataHandler);
			this.stdinDataHandler = undefined;
		}
		if (this.stdinErrorHandler) {
			process.stdin.removeListener("error", this.stdinErrorHandler);
			this.stdinErrorHandler = undefined;
		}
		if (this.stdinEndHandler) {
			process.stdin.removeListener("end", this.stdinEndHandler);
			this.stdinEndHandler = undefined;
		}
		if (this.resizeHandler) {
			process.stdout.removeListener("resize", this.resizeHandler);
			this.resizeHandler = undefined;
		}

		// 暂停 stdin，以防止在禁用原始模式后重新解释任何缓冲输入
		process.stdin.pause();

		// 恢复原始模式状态
		if (this.started) {
			this.started = false;
			try {
				process.stdin.setRawMode(this.wasRaw);
			} catch (error) {
				throw new TerminalError("setRawMode", error);
			}
		}
	}

	write(data: string): void {
		// 帧内容按 latin1 编码，每个字符写出一个字节
		process.stdout.write(Buffer.from(data, "latin1"));
		if (this.writeLogPath) {
			try {
				fs.appendFileSync(this.writeLogPath, data, { encoding: "latin1" });
			} catch {
				// 忽略日志错误
			}
		}
	}

	/**
	 * 优先使用 stdout 报告的尺寸；没有时把光标推到右下角并查询其位置。
	 */
	async getWindowSize(): Promise<WindowSize> {
		const { rows, columns } = process.stdout;
		if (rows && columns) {
			return { rows, columns };
		}
		if (this.stdinDataHandler) {
			throw new TerminalError("getWindowSize", new Error("terminal size unavailable"));
		}
		return this.queryCursorPosition();
	}

	private queryCursorPosition(): Promise<WindowSize> {
		return new Promise((resolve, reject) => {
			let response = "";
			const cleanup = () => {
				clearTimeout(timer);
				process.stdin.removeListener("data", onData);
				process.stdin.pause();
			};
			const onData = (data: Buffer) => {
				response += data.toString("latin1");
				if (!response.includes("R")) return;
				cleanup();
				const size = parseCursorPositionReport(response);
				if (size) {
					resolve(size);
				} else {
					reject(new TerminalError("getWindowSize", new Error(`unexpected response ${JSON.stringify(response)}`)));
				}
			};
			const timer = setTimeout(() => {
				cleanup();
				reject(new TerminalError("getWindowSize", new Error("no cursor position report")));
			}, this.sizeQueryTimeout);

			process.stdin.on("data", onData);
			process.stdin.resume();
			this.write(CURSOR_TO_BOTTOM_RIGHT + REQUEST_CURSOR_POSITION);
		});
	}
}
