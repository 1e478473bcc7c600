import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

// =============================================================================
// 包检测
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * 获取包根目录（包含 package.json 的目录）。
 * 从 __dirname 向上遍历，对 src/ 和 dist/ 都适用。
 */
export function getPackageDir(): string {
	let dir = __dirname;
	while (dir !== dirname(dir)) {
		if (existsSync(join(dir, "package.json"))) {
			return dir;
		}
		dir = dirname(dir);
	}
	// 回退（不应发生）
	return __dirname;
}

/** 获取 package.json 的路径 */
export function getPackageJsonPath(): string {
	return join(getPackageDir(), "package.json");
}

// =============================================================================
// 应用配置
// =============================================================================

function readVersion(): string {
	const parsed: unknown = JSON.parse(readFileSync(getPackageJsonPath(), "utf-8"));
	if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
		return parsed.version;
	}
	return "0.0.0";
}

export const APP_NAME = "tilde";
export const CONFIG_DIR_NAME = ".tilde";
export const VERSION: string = readVersion();

// 例如：TILDE_CONFIG_DIR
export const ENV_CONFIG_DIR = `${APP_NAME.toUpperCase()}_CONFIG_DIR`;

/** 欢迎语，缓冲区为空时显示在屏幕三分之一高度处 */
export const WELCOME_MESSAGE = `${APP_NAME.charAt(0).toUpperCase()}${APP_NAME.slice(1)} editor -- version ${VERSION}`;

// =============================================================================
// 用户配置路径 (~/.tilde/*)
// =============================================================================

/** 获取配置目录（例如：~/.tilde/） */
export function getConfigDir(): string {
	const envDir = process.env[ENV_CONFIG_DIR];
	if (envDir) {
		// 将波浪号扩展为主目录
		if (envDir === "~") return homedir();
		if (envDir.startsWith("~/")) return homedir() + envDir.slice(1);
		return envDir;
	}
	return join(homedir(), CONFIG_DIR_NAME);
}

/** 获取 settings.json 的路径 */
export function getSettingsPath(configDir: string = getConfigDir()): string {
	return join(configDir, "settings.json");
}

/** 获取调试日志文件的路径 */
export function getDebugLogPath(): string {
	return join(getConfigDir(), `${APP_NAME}-debug.log`);
}
