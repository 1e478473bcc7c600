/**
 * StdinBuffer 把原始 stdin 数据逐字节送入 KeyDecoder，并发出完整的按键。
 *
 * stdin 数据事件可能在转义序列中间被拆开，例如方向键 `\x1b[A` 可能按以下
 * 方式到达：
 * - 事件 1：`\x1b`
 * - 事件 2：`[A`
 *
 * 解码器停在序列中间时会启动一个有界的计时器。如果在超时前没有后续字节，
 * 挂起的序列解析为字面 ESC（用户单独按下了 Escape）。
 * 调用 `process()` 方法来输入数据。
 */

import { EventEmitter } from "events";
import { KeyDecoder } from "./key-decoder.js";
import type { KeyEvent } from "./keys.js";

export type StdinBufferOptions = {
	/**
	 * 等待转义序列后续字节的最长时间（默认：100ms）
	 * 超过此时间后，挂起的序列解析为 ESC
	 */
	timeout?: number;
};

export type StdinBufferEventMap = {
	key: [KeyEvent];
};

export class StdinBuffer extends EventEmitter<StdinBufferEventMap> {
	private readonly decoder = new KeyDecoder();
	private timeout: ReturnType<typeof setTimeout> | null = null;
	private readonly timeoutMs: number;

	constructor(options: StdinBufferOptions = {}) {
		super();
		this.timeoutMs = options.timeout ?? 100;
	}

	public process(data: string | Buffer): void {
		// 清除任何待处理的超时
		this.clearTimer();

		// 字符串按 latin1 处理，保证每个字符对应一个字节
		const bytes = Buffer.isBuffer(data) ? data : Buffer.from(data, "latin1");

		for (const byte of bytes) {
			const key = this.decoder.feed(byte);
			if (key) {
				this.emit("key", key);
			}
		}

		if (this.decoder.pending) {
			this.timeout = setTimeout(() => {
				this.timeout = null;
				this.flush();
			}, this.timeoutMs);
		}
	}

	/** 立即结束挂起的序列 */
	flush(): void {
		this.clearTimer();
		const key = this.decoder.timeout();
		if (key) {
			this.emit("key", key);
		}
	}

	get pending(): boolean {
		return this.decoder.pending;
	}

	clear(): void {
		this.clearTimer();
		this.decoder.reset();
	}

	destroy(): void {
		this.clear();
		this.removeAllListeners();
	}

	private clearTimer(): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}
	}
}
