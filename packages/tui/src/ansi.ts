/**
 * 编辑器使用的固定 VT100 控制序列子集。
 * 不做任何终端能力协商。
 */

export const HIDE_CURSOR = "\x1b[?25l";
export const SHOW_CURSOR = "\x1b[?25h";
export const CURSOR_HOME = "\x1b[H";
export const ERASE_LINE = "\x1b[K"; // 清除到行尾
export const ERASE_SCREEN = "\x1b[2J";
export const INVERSE_ON = "\x1b[7m";
export const INVERSE_OFF = "\x1b[m";

// 将光标推到右下角，随后查询光标位置（用于获取窗口尺寸的回退方案）
export const CURSOR_TO_BOTTOM_RIGHT = "\x1b[999C\x1b[999B";
export const REQUEST_CURSOR_POSITION = "\x1b[6n";

/** 将光标移动到以 1 为起始的 (row, col) */
export function cursorTo(row: number, col: number): string {
	return `\x1b[${row};${col}H`;
}

/** 清屏并把光标放回左上角 */
export function clearScreen(): string {
	return ERASE_SCREEN + CURSOR_HOME;
}
