// 编辑器核心
export { debugLog, isDebugEnabled } from "./core/debug-log.js";
export {
	EditorSession,
	type EditorSessionOptions,
	keyLabel,
	SAVE_AS_PROMPT,
} from "./core/editor-session.js";
export { type FileStore, InMemoryFileStore, NodeFileStore, splitLines } from "./core/file-io.js";
export { applyPromptKey, formatPrompt, type PromptStep } from "./core/prompt.js";
export { type FrameState, type OutputSink, Renderer, renderFrame, type StatusMessage } from "./core/renderer.js";
export { cxToRx, DEFAULT_TAB_STOP, Row, rxToCx } from "./core/row.js";
export { SEARCH_PROMPT, type SearchDirection, SearchSession } from "./core/search.js";
export { parseSettings, type Settings, SettingsManager, SettingsSchema } from "./core/settings-manager.js";
export { type CursorPosition, LINE_TERMINATOR, TextBuffer } from "./core/text-buffer.js";
export { type CursorMove, Viewport, type ViewportSnapshot } from "./core/viewport.js";
// 模式
export { InteractiveMode, type InteractiveModeOptions } from "./modes/interactive-mode.js";
// CLI
export { main } from "./main.js";
