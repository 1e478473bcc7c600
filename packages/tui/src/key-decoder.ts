import { charKey, ESC, type KeyEvent, type NamedKey, namedKey } from "./keys.js";

/**
 * 解码器状态：
 * - normal：普通字节直接映射为按键
 * - escapeSeen：已读到 ESC，等待第一个后续字节
 * - escapeByte：已读到 ESC 和第一个后续字节（"[" 或 "O" 或其他）
 * - csiDigit：已读到 ESC [ 和一个数字，等待结尾的 "~"
 */
export type DecoderState =
	| { kind: "normal" }
	| { kind: "escapeSeen" }
	| { kind: "escapeByte"; first: number }
	| { kind: "csiDigit"; digit: number };

type Transition = { next: DecoderState; key?: KeyEvent };

const NORMAL: DecoderState = { kind: "normal" };
const ESCAPE_KEY = namedKey("escape");

const LEFT_BRACKET = "[".charCodeAt(0);
const LETTER_O = "O".charCodeAt(0);
const TILDE = "~".charCodeAt(0);

// ESC [ <字母>
const CSI_LETTER_KEYS: Record<string, NamedKey> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	H: "home",
	F: "end",
};

// ESC [ <数字> ~
const CSI_NUMERIC_KEYS: Record<string, NamedKey> = {
	"1": "home",
	"3": "delete",
	"4": "end",
	"5": "pageUp",
	"6": "pageDown",
	"7": "home",
	"8": "end",
};

// ESC O <字母>
const SS3_KEYS: Record<string, NamedKey> = {
	H: "home",
	F: "end",
};

function isDigit(byte: number): boolean {
	return byte >= 0x30 && byte <= 0x39;
}

function resolve(table: Record<string, NamedKey>, byte: number): Transition {
	const name = table[String.fromCharCode(byte)];
	return { next: NORMAL, key: name ? namedKey(name) : ESCAPE_KEY };
}

/**
 * 转移表：每个状态对输入字节的处理。
 * 无法识别的序列解析为字面 ESC，已读取的字节被丢弃。
 */
const TRANSITIONS: { [K in DecoderState["kind"]]: (state: Extract<DecoderState, { kind: K }>, byte: number) => Transition } =
	{
		normal: (_state, byte) => (byte === ESC ? { next: { kind: "escapeSeen" } } : { next: NORMAL, key: charKey(byte) }),
		escapeSeen: (_state, byte) => ({ next: { kind: "escapeByte", first: byte } }),
		escapeByte: (state, byte) => {
			if (state.first === LEFT_BRACKET) {
				if (isDigit(byte)) {
					return { next: { kind: "csiDigit", digit: byte } };
				}
				return resolve(CSI_LETTER_KEYS, byte);
			}
			if (state.first === LETTER_O) {
				return resolve(SS3_KEYS, byte);
			}
			return { next: NORMAL, key: ESCAPE_KEY };
		},
		csiDigit: (state, byte) => {
			if (byte !== TILDE) {
				return { next: NORMAL, key: ESCAPE_KEY };
			}
			return resolve(CSI_NUMERIC_KEYS, state.digit);
		},
	};

/**
 * 原始字节到逻辑按键的有限状态解码器。
 *
 * 不做任何 I/O：调用方逐字节调用 `feed()`，并在等待后续字节超时时调用
 * `timeout()`。
 */
export class KeyDecoder {
	private state: DecoderState = NORMAL;

	/** 输入一个字节，如果解析出完整按键则返回它 */
	feed(byte: number): KeyEvent | undefined {
		const transition = this.step(byte);
		this.state = transition.next;
		return transition.key;
	}

	/** 等待后续字节超时：挂起的序列解析为 ESC */
	timeout(): KeyEvent | undefined {
		if (this.state.kind === "normal") {
			return undefined;
		}
		this.state = NORMAL;
		return ESCAPE_KEY;
	}

	/** 是否处于转义序列中间 */
	get pending(): boolean {
		return this.state.kind !== "normal";
	}

	getState(): DecoderState {
		return this.state;
	}

	reset(): void {
		this.state = NORMAL;
	}

	private step(byte: number): Transition {
		const state = this.state;
		switch (state.kind) {
			case "normal":
				return TRANSITIONS.normal(state, byte);
			case "escapeSeen":
				return TRANSITIONS.escapeSeen(state, byte);
			case "escapeByte":
				return TRANSITIONS.escapeByte(state, byte);
			case "csiDigit":
				return TRANSITIONS.csiDigit(state, byte);
		}
	}
}

/** 一次性解码完整的字节序列（末尾挂起的序列按超时处理） */
export function decodeKeys(bytes: Iterable<number>): KeyEvent[] {
	const decoder = new KeyDecoder();
	const keys: KeyEvent[] = [];
	for (const byte of bytes) {
		const key = decoder.feed(byte);
		if (key) keys.push(key);
	}
	const pending = decoder.timeout();
	if (pending) keys.push(pending);
	return keys;
}
