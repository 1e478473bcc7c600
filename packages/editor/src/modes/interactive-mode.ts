import { ansi, KeyQueue, type Terminal } from "@tilde/tui";
import { debugLog } from "../core/debug-log.js";
import { EditorSession } from "../core/editor-session.js";
import type { FileStore } from "../core/file-io.js";
import type { SettingsManager } from "../core/settings-manager.js";

export interface InteractiveModeOptions {
	terminal: Terminal;
	files: FileStore;
	settings: SettingsManager;
	filename?: string;
}

/**
 * 交互模式：把终端接到编辑器会话上。
 *
 * 终端按键推入 KeyQueue，会话循环从中拉取；读取失败会让挂起的读取以
 * TerminalError 拒绝，由调用方按致命错误处理。
 */
export class InteractiveMode {
	readonly session: EditorSession;
	private readonly terminal: Terminal;
	private readonly keys: KeyQueue;
	private readonly filename?: string;
	private started = false;

	private constructor(options: InteractiveModeOptions, session: EditorSession, keys: KeyQueue) {
		this.terminal = options.terminal;
		this.filename = options.filename;
		this.session = session;
		this.keys = keys;
	}

	/** 查询终端尺寸并创建会话 */
	static async create(options: InteractiveModeOptions): Promise<InteractiveMode> {
		const keys = new KeyQueue();
		const size = await options.terminal.getWindowSize();
		const session = new EditorSession({
			keys,
			output: options.terminal,
			size,
			files: options.files,
			settings: options.settings,
		});
		return new InteractiveMode(options, session, keys);
	}

	/**
	 * 运行编辑器直到退出。无论成功与否都恢复终端模式。
	 */
	async run(): Promise<void> {
		if (this.filename !== undefined) {
			await this.session.open(this.filename);
		}
		this.session.showHelp();

		this.terminal.start(
			(key) => this.keys.push(key),
			() => this.handleResize(),
			(error) => this.keys.fail(error),
		);
		this.started = true;

		try {
			await this.session.run();
			this.terminal.write(ansi.clearScreen());
		} finally {
			this.stop();
		}
	}

	stop(): void {
		if (!this.started) return;
		this.started = false;
		this.terminal.stop();
	}

	private handleResize(): void {
		this.terminal.getWindowSize().then(
			(size) => {
				debugLog(`resize ${size.columns}x${size.rows}`);
				this.session.resize(size);
				this.session.refreshScreen();
			},
			(error: unknown) => this.keys.fail(error),
		);
	}
}
