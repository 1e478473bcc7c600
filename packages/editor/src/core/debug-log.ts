import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { getDebugLogPath } from "../config.js";

/**
 * 调试日志。编辑器占用屏幕时不能写 stdout，
 * 设置 TILDE_DEBUG=1 后追加到 ~/.tilde/tilde-debug.log。
 */
export function isDebugEnabled(): boolean {
	return process.env.TILDE_DEBUG === "1";
}

export function debugLog(message: string, logPath: string = getDebugLogPath()): void {
	if (!isDebugEnabled()) return;
	try {
		mkdirSync(dirname(logPath), { recursive: true });
		appendFileSync(logPath, `[${new Date().toISOString()}] ${message}\n`);
	} catch {
		// 忽略日志错误
	}
}
