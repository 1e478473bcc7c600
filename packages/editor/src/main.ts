/**
 * 编辑器 CLI 的主入口点。
 *
 * 解析参数、加载设置、进入原始模式并运行交互模式。终端相关的失败是
 * 致命的：恢复终端、清屏、打印诊断信息并以非零状态退出。
 */

import { ansi, ProcessTerminal } from "@tilde/tui";
import chalk from "chalk";
import { parseArgs, printHelp } from "./cli/args.js";
import { APP_NAME, VERSION } from "./config.js";
import { debugLog } from "./core/debug-log.js";
import { NodeFileStore } from "./core/file-io.js";
import { SettingsManager } from "./core/settings-manager.js";
import { InteractiveMode } from "./modes/interactive-mode.js";

// TerminalError 的消息已包含失败的操作名，例如 "setRawMode: stdin is not a terminal"
function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export async function main(args: string[]): Promise<void> {
	const parsed = parseArgs(args);

	if (parsed.errors.length > 0) {
		for (const message of parsed.errors) {
			console.error(chalk.red(message));
		}
		console.error(chalk.dim(`Use "${APP_NAME} --help" for usage.`));
		process.exitCode = 1;
		return;
	}
	if (parsed.help) {
		printHelp();
		return;
	}
	if (parsed.version) {
		console.log(VERSION);
		return;
	}

	const settings = SettingsManager.create();
	for (const message of settings.getLoadErrors()) {
		console.error(chalk.yellow(`Warning: ${message}`));
	}

	const terminal = new ProcessTerminal({ escapeTimeout: settings.getEscapeTimeoutMs() });
	const restore = () => {
		try {
			terminal.stop();
		} catch (error) {
			debugLog(`failed to restore terminal: ${describeError(error)}`);
		}
	};
	process.once("exit", restore);

	try {
		terminal.enableRawMode();
		const mode = await InteractiveMode.create({
			terminal,
			files: new NodeFileStore(),
			settings,
			filename: parsed.file,
		});
		await mode.run();
		process.exitCode = 0;
	} catch (error) {
		restore();
		process.stdout.write(ansi.clearScreen());
		debugLog(`fatal: ${describeError(error)}`);
		console.error(chalk.red(describeError(error)));
		process.exitCode = 1;
	} finally {
		process.removeListener("exit", restore);
	}
}
