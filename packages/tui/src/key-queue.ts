import { TerminalError } from "./errors.js";
import type { KeyEvent } from "./keys.js";

/**
 * 按键来源 - 编辑器循环唯一的挂起点
 */
export interface KeySource {
	nextKey(): Promise<KeyEvent>;
}

/**
 * 把推入的按键转换为可等待的拉取接口。
 *
 * 按键先于读取到达时排队；读取先于按键时挂起等待。
 * 输入流失败后，所有挂起和后续的读取都以 TerminalError 拒绝。
 */
export class KeyQueue implements KeySource {
	private keys: KeyEvent[] = [];
	private waiters: { resolve: (key: KeyEvent) => void; reject: (error: Error) => void }[] = [];
	private failure: TerminalError | null = null;

	push(key: KeyEvent): void {
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.resolve(key);
		} else {
			this.keys.push(key);
		}
	}

	fail(cause: unknown): void {
		if (this.failure) return;
		this.failure = cause instanceof TerminalError ? cause : new TerminalError("read", cause);
		const waiters = this.waiters;
		this.waiters = [];
		for (const waiter of waiters) {
			waiter.reject(this.failure);
		}
	}

	nextKey(): Promise<KeyEvent> {
		const key = this.keys.shift();
		if (key) {
			return Promise.resolve(key);
		}
		if (this.failure) {
			return Promise.reject(this.failure);
		}
		return new Promise((resolve, reject) => {
			this.waiters.push({ resolve, reject });
		});
	}

	get size(): number {
		return this.keys.length;
	}
}
