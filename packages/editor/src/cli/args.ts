/**
 * CLI 参数解析和帮助显示
 */

import chalk from "chalk";
import { APP_NAME, ENV_CONFIG_DIR, VERSION } from "../config.js";

export interface Args {
	help?: boolean;
	version?: boolean;
	/** 启动时加载的文件 */
	file?: string;
	/** 参数错误（未知标志或多余的位置参数） */
	errors: string[];
}

export function parseArgs(args: string[]): Args {
	const result: Args = { errors: [] };
	let positionalOnly = false;

	for (const arg of args) {
		if (!positionalOnly && arg === "--") {
			positionalOnly = true;
		} else if (!positionalOnly && (arg === "--help" || arg === "-h")) {
			result.help = true;
		} else if (!positionalOnly && (arg === "--version" || arg === "-v")) {
			result.version = true;
		} else if (!positionalOnly && arg.startsWith("-") && arg !== "-") {
			result.errors.push(`Unknown option: ${arg}`);
		} else if (result.file === undefined) {
			result.file = arg;
		} else {
			result.errors.push(`Unexpected argument: ${arg}`);
		}
	}

	return result;
}

export function printHelp(): void {
	console.log(`${chalk.bold(APP_NAME)} - a minimal terminal text editor (version ${VERSION})

${chalk.bold("Usage:")}
  ${APP_NAME} [options] [file]

${chalk.bold("Options:")}
  --help, -h                     Show this help
  --version, -v                  Show version number

${chalk.bold("Keys:")}
  Ctrl-S                         Save (prompts for a file name if needed)
  Ctrl-Q                         Quit (press repeatedly to discard unsaved changes)
  Ctrl-F                         Incremental search (arrows: next/previous, ESC: cancel)

${chalk.bold("Environment Variables:")}
  ${ENV_CONFIG_DIR.padEnd(30)} - Configuration directory (default: ~/.${APP_NAME})
  ${"TILDE_DEBUG".padEnd(30)} - Set to 1 to append debug messages to the debug log
  ${"TILDE_TUI_WRITE_LOG".padEnd(30)} - Mirror every terminal write to this file
`);
}
