/**
 * 逻辑按键事件和按键标识符。
 *
 * 原始字节（可打印字符或控制码）以 `char` 事件表示，转义序列解码出的
 * 按键以 `named` 事件表示。每个字节占一列，不做多字节处理。
 */

export type NamedKey = "escape" | "up" | "down" | "left" | "right" | "home" | "end" | "delete" | "pageUp" | "pageDown";

export type KeyEvent = { type: "char"; code: number } | { type: "named"; name: NamedKey };

/**
 * 按键标识符，例如 "ctrl+q"、"enter"、"pageUp"、"a"。
 * 用于按键绑定配置。
 */
export type KeyId = string;

export const ENTER = 13;
export const BACKSPACE = 127;
export const TAB = 9;
export const ESC = 0x1b;

/** 0x1f 掩码：与终端对 Ctrl 组合键的编码方式一致 */
export function ctrlKey(letter: string): number {
	return letter.charCodeAt(0) & 0x1f;
}

export function charKey(code: number): KeyEvent {
	return { type: "char", code };
}

export function namedKey(name: NamedKey): KeyEvent {
	return { type: "named", name };
}

/** 可打印的 ASCII（空格到 ~） */
export function isPrintable(key: KeyEvent): boolean {
	return key.type === "char" && key.code >= 32 && key.code < 127;
}

/**
 * 返回按键的标识符。
 */
export function keyIdOf(key: KeyEvent): KeyId {
	if (key.type === "named") {
		return key.name;
	}

	const code = key.code;
	switch (code) {
		case ENTER:
			return "enter";
		case TAB:
			return "tab";
		case BACKSPACE:
			return "backspace";
		case ESC:
			return "escape";
		case 0:
			return "ctrl+@";
	}

	if (code >= 1 && code <= 26) {
		return `ctrl+${String.fromCharCode(code + 96)}`;
	}
	if (code >= 28 && code <= 31) {
		// ctrl+\ ctrl+] ctrl+^ ctrl+_
		return `ctrl+${String.fromCharCode(code + 64)}`;
	}
	if (code === 32) {
		return "space";
	}
	if (code < 127) {
		return String.fromCharCode(code);
	}
	return `byte+${code}`;
}

/**
 * 检查按键是否匹配给定的按键标识符（不区分大小写的修饰键前缀）。
 */
export function matchesKey(key: KeyEvent, keyId: KeyId): boolean {
	const id = keyIdOf(key);
	if (id === keyId) return true;
	// 修饰键名称允许大小写混用，例如 "Ctrl+Q"
	if (keyId.length > 1 && id.length > 1) {
		return id.toLowerCase() === keyId.toLowerCase();
	}
	return false;
}
