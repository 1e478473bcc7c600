import {
	type EditorAction,
	EditorKeybindingsManager,
	type KeyEvent,
	type KeyId,
	type KeySource,
	type WindowSize,
} from "@tilde/tui";
import { WELCOME_MESSAGE } from "../config.js";
import { debugLog } from "./debug-log.js";
import type { FileStore } from "./file-io.js";
import { applyPromptKey, formatPrompt } from "./prompt.js";
import { type OutputSink, Renderer, type StatusMessage } from "./renderer.js";
import { SEARCH_PROMPT, SearchSession } from "./search.js";
import { SettingsManager } from "./settings-manager.js";
import { TextBuffer } from "./text-buffer.js";
import { Viewport } from "./viewport.js";

/** 状态栏和消息栏占用的行数 */
const BAR_ROWS = 2;

export const SAVE_AS_PROMPT = "Save as: %s (ESC to cancel)";

export interface EditorSessionOptions {
	/** 按键来源 */
	keys: KeySource;
	/** 帧输出 */
	output: OutputSink;
	/** 终端尺寸（包含状态栏和消息栏） */
	size: WindowSize;
	files: FileStore;
	settings?: SettingsManager;
	/** 当前时间（毫秒），默认 Date.now */
	clock?: () => number;
}

/** 把按键标识符格式化为提示中的写法，例如 "ctrl+q" -> "Ctrl-Q" */
export function keyLabel(keyId: KeyId): string {
	if (keyId.startsWith("ctrl+") && keyId.length === 6) {
		return `Ctrl-${keyId.slice(5).toUpperCase()}`;
	}
	return keyId;
}

function textAreaSize(size: WindowSize): { screenrows: number; screencols: number } {
	return {
		screenrows: Math.max(1, size.rows - BAR_ROWS),
		screencols: Math.max(1, size.columns),
	};
}

/**
 * 编辑器会话：拥有缓冲区、视口、文件名和状态消息，把按键分派到缓冲区
 * 修改或光标移动，并驱动渲染循环。
 */
export class EditorSession {
	readonly buffer: TextBuffer;
	readonly viewport: Viewport;
	readonly keybindings: EditorKeybindingsManager;
	filename?: string;

	private readonly keys: KeySource;
	private readonly files: FileStore;
	private readonly renderer: Renderer;
	private readonly clock: () => number;
	private readonly quitTimes: number;
	private readonly messageTimeoutMs: number;
	private status: StatusMessage;
	private quitTimesLeft: number;
	private quitRequested = false;

	constructor(options: EditorSessionOptions) {
		const settings = options.settings ?? SettingsManager.inMemory();
		const { screenrows, screencols } = textAreaSize(options.size);

		this.keys = options.keys;
		this.files = options.files;
		this.renderer = new Renderer(options.output);
		this.clock = options.clock ?? Date.now;
		this.buffer = new TextBuffer(settings.getTabStop());
		this.viewport = new Viewport(screenrows, screencols);
		this.keybindings = new EditorKeybindingsManager(settings.getKeybindings());
		this.quitTimes = settings.getQuitTimes();
		this.quitTimesLeft = this.quitTimes;
		this.messageTimeoutMs = settings.getMessageTimeoutMs();
		this.status = { text: "", time: 0 };
	}

	get statusMessage(): StatusMessage {
		return { ...this.status };
	}

	get dirty(): number {
		return this.buffer.dirty;
	}

	/** 会话是否已请求退出 */
	get quitting(): boolean {
		return this.quitRequested;
	}

	/** 加载文件，完成后 dirty 为 0 */
	async open(filename: string): Promise<void> {
		const lines = await this.files.loadLines(filename);
		this.buffer.load(lines);
		this.filename = filename;
		debugLog(`opened ${filename} (${lines.length} lines)`);
	}

	setStatusMessage(text: string): void {
		this.status = { text, time: this.clock() };
	}

	showHelp(): void {
		const label = (action: EditorAction) => keyLabel(this.keybindings.getKeys(action)[0] ?? "");
		this.setStatusMessage(`HELP: ${label("save")} = save | ${label("quit")} = quit | ${label("find")} = find`);
	}

	resize(size: WindowSize): void {
		const { screenrows, screencols } = textAreaSize(size);
		this.viewport.resize(screenrows, screencols);
	}

	refreshScreen(): void {
		this.renderer.render({
			buffer: this.buffer,
			viewport: this.viewport,
			filename: this.filename,
			status: this.status,
			now: this.clock(),
			messageTimeoutMs: this.messageTimeoutMs,
			welcome: WELCOME_MESSAGE,
		});
	}

	/**
	 * 主循环：渲染一帧，等待一个按键并处理，直到请求退出。
	 */
	async run(): Promise<void> {
		while (!this.quitRequested) {
			this.refreshScreen();
			await this.processKeypress();
		}
	}

	async processKeypress(): Promise<void> {
		const key = await this.keys.nextKey();
		await this.dispatch(key);
	}

	async dispatch(key: KeyEvent): Promise<void> {
		const bindings = this.keybindings;
		const { buffer, viewport } = this;

		if (bindings.matches(key, "quit")) {
			if (buffer.dirty > 0 && this.quitTimesLeft > 0) {
				const quitKey = keyLabel(bindings.getKeys("quit")[0] ?? "");
				this.setStatusMessage(
					`WARNING!!! File has unsaved changes. Press ${quitKey} ${this.quitTimesLeft} more times to quit.`,
				);
				this.quitTimesLeft--;
				return;
			}
			this.quitRequested = true;
			return;
		}

		if (bindings.matches(key, "newLine")) {
			viewport.setCursor(buffer.insertNewline(viewport.cy, viewport.cx));
		} else if (bindings.matches(key, "save")) {
			await this.save();
		} else if (bindings.matches(key, "find")) {
			await this.find();
		} else if (bindings.matches(key, "deleteCharBackward")) {
			viewport.setCursor(buffer.deleteChar(viewport.cy, viewport.cx));
		} else if (bindings.matches(key, "deleteCharForward")) {
			viewport.moveCursor("right", buffer);
			viewport.setCursor(buffer.deleteChar(viewport.cy, viewport.cx));
		} else if (bindings.matches(key, "cursorLineStart")) {
			viewport.lineStart();
		} else if (bindings.matches(key, "cursorLineEnd")) {
			viewport.lineEnd(buffer);
		} else if (bindings.matches(key, "pageUp")) {
			viewport.pageUp(buffer);
		} else if (bindings.matches(key, "pageDown")) {
			viewport.pageDown(buffer);
		} else if (bindings.matches(key, "cursorUp")) {
			viewport.moveCursor("up", buffer);
		} else if (bindings.matches(key, "cursorDown")) {
			viewport.moveCursor("down", buffer);
		} else if (bindings.matches(key, "cursorLeft")) {
			viewport.moveCursor("left", buffer);
		} else if (bindings.matches(key, "cursorRight")) {
			viewport.moveCursor("right", buffer);
		} else if (bindings.matches(key, "refresh")) {
			// 不做任何事，下一帧照常重绘
		} else if (key.type === "char") {
			viewport.setCursor(buffer.insertChar(viewport.cy, viewport.cx, String.fromCharCode(key.code)));
		}

		this.quitTimesLeft = this.quitTimes;
	}

	/**
	 * 在消息栏中显示提示并读取一行输入。取消时返回 null。
	 * `onKey` 在每次按键后以当前输入调用，包括结束提示的按键。
	 */
	async prompt(template: string, onKey?: (input: string, key: KeyEvent) => void): Promise<string | null> {
		let input = "";
		while (true) {
			this.setStatusMessage(formatPrompt(template, input));
			this.refreshScreen();

			const key = await this.keys.nextKey();
			const step = applyPromptKey(input, key, this.keybindings);
			if (step.kind === "cancel") {
				this.setStatusMessage("");
				onKey?.(input, key);
				return null;
			}
			if (step.kind === "submit") {
				this.setStatusMessage("");
				onKey?.(step.input, key);
				return step.input;
			}
			input = step.input;
			onKey?.(input, key);
		}
	}

	/**
	 * 保存到磁盘。没有文件名时先提示输入。
	 * 写入失败只显示消息，缓冲区和 dirty 保持不变。
	 */
	async save(): Promise<void> {
		if (this.filename === undefined) {
			const name = await this.prompt(SAVE_AS_PROMPT);
			if (name === null) {
				this.setStatusMessage("Save aborted");
				return;
			}
			this.filename = name;
		}

		const text = this.buffer.rowsToFlatText();
		try {
			const written = await this.files.writeBytes(this.filename, text);
			this.buffer.markClean();
			this.setStatusMessage(`${written} bytes written to disk`);
			debugLog(`saved ${this.filename} (${written} bytes)`);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			debugLog(`save failed for ${this.filename}: ${message}`);
			this.setStatusMessage(`Can't save! I/O error: ${message}`);
		}
	}

	/**
	 * 增量搜索。取消时恢复搜索前的光标和滚动位置。
	 */
	async find(): Promise<void> {
		const search = new SearchSession(this.buffer, this.viewport, this.keybindings);
		const query = await this.prompt(SEARCH_PROMPT, (input, key) => {
			search.step(input, key);
		});
		if (query === null) {
			search.cancel();
		} else {
			search.commit();
		}
	}
}
