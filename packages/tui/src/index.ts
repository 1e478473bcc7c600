// 终端控制序列
export * as ansi from "./ansi.js";
// 错误
export { TerminalError } from "./errors.js";
// 转义序列解码
export { type DecoderState, decodeKeys, KeyDecoder } from "./key-decoder.js";
// 可等待的按键来源
export { KeyQueue, type KeySource } from "./key-queue.js";
// 按键绑定
export {
	DEFAULT_EDITOR_KEYBINDINGS,
	EDITOR_ACTIONS,
	type EditorAction,
	type EditorKeybindingsConfig,
	EditorKeybindingsManager,
	isEditorAction,
} from "./keybindings.js";
// 键盘输入处理
export {
	BACKSPACE,
	charKey,
	ctrlKey,
	ENTER,
	ESC,
	isPrintable,
	type KeyEvent,
	type KeyId,
	keyIdOf,
	matchesKey,
	type NamedKey,
	namedKey,
	TAB,
} from "./keys.js";
// 输入缓冲
export { StdinBuffer, type StdinBufferEventMap, type StdinBufferOptions } from "./stdin-buffer.js";
// 终端接口和实现
export {
	ProcessTerminal,
	type ProcessTerminalOptions,
	parseCursorPositionReport,
	type Terminal,
	type WindowSize,
} from "./terminal.js";
