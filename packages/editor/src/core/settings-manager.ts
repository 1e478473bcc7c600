import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { type EditorKeybindingsConfig, isEditorAction } from "@tilde/tui";
import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { CONFIG_DIR_NAME, getConfigDir, getSettingsPath } from "../config.js";
import { DEFAULT_TAB_STOP } from "./row.js";

const KeyBindingSchema = Type.Union([Type.String(), Type.Array(Type.String(), { minItems: 1 })]);

export const SettingsSchema = Type.Object({
	tabStop: Type.Optional(Type.Integer({ minimum: 1, maximum: 16 })), // 默认：8
	quitTimes: Type.Optional(Type.Integer({ minimum: 0, maximum: 10 })), // 默认：3（有未保存修改时退出需要的确认次数）
	messageTimeoutMs: Type.Optional(Type.Integer({ minimum: 0 })), // 默认：5000
	escapeTimeoutMs: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000 })), // 默认：100（等待转义序列后续字节）
	keybindings: Type.Optional(Type.Record(Type.String(), KeyBindingSchema)),
});

export type Settings = Omit<Static<typeof SettingsSchema>, "keybindings"> & {
	keybindings?: EditorKeybindingsConfig;
};

export const DEFAULT_QUIT_TIMES = 3;
export const DEFAULT_MESSAGE_TIMEOUT_MS = 5000;
export const DEFAULT_ESCAPE_TIMEOUT_MS = 100;

/** 合并设置：覆盖值优先，keybindings 按操作合并 */
function mergeSettings(base: Settings, overrides: Settings): Settings {
	const result: Settings = { ...base };
	if (overrides.tabStop !== undefined) result.tabStop = overrides.tabStop;
	if (overrides.quitTimes !== undefined) result.quitTimes = overrides.quitTimes;
	if (overrides.messageTimeoutMs !== undefined) result.messageTimeoutMs = overrides.messageTimeoutMs;
	if (overrides.escapeTimeoutMs !== undefined) result.escapeTimeoutMs = overrides.escapeTimeoutMs;
	if (overrides.keybindings !== undefined) {
		result.keybindings = { ...base.keybindings, ...overrides.keybindings };
	}
	return result;
}

/** 校验单个字段，失败时记录错误并忽略该字段 */
function pickField<T extends TSchema>(
	record: object,
	key: string,
	schema: T,
	source: string,
	errors: string[],
): Static<T> | undefined {
	if (!(key in record)) return undefined;
	const value: unknown = Reflect.get(record, key);
	if (Value.Check(schema, value)) return value;
	const first = Value.Errors(schema, value).First();
	errors.push(`${source}: invalid "${key}"${first ? ` (${first.message})` : ""}`);
	return undefined;
}

/**
 * 校验解析后的 JSON。无效或未知的字段被忽略，错误追加到 `errors`。
 */
export function parseSettings(raw: unknown, source: string, errors: string[]): Settings {
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		errors.push(`${source}: expected a JSON object`);
		return {};
	}

	for (const key of Object.keys(raw)) {
		if (!(key in SettingsSchema.properties)) {
			errors.push(`${source}: unknown setting "${key}"`);
		}
	}

	const fields = SettingsSchema.properties;
	const settings: Settings = {
		tabStop: pickField(raw, "tabStop", fields.tabStop, source, errors),
		quitTimes: pickField(raw, "quitTimes", fields.quitTimes, source, errors),
		messageTimeoutMs: pickField(raw, "messageTimeoutMs", fields.messageTimeoutMs, source, errors),
		escapeTimeoutMs: pickField(raw, "escapeTimeoutMs", fields.escapeTimeoutMs, source, errors),
	};

	const bindings = pickField(raw, "keybindings", fields.keybindings, source, errors);
	if (bindings) {
		const keybindings: EditorKeybindingsConfig = {};
		for (const [action, keys] of Object.entries(bindings)) {
			if (isEditorAction(action)) {
				keybindings[action] = keys;
			} else {
				errors.push(`${source}: unknown action "${action}" in keybindings`);
			}
		}
		settings.keybindings = keybindings;
	}

	return settings;
}

export class SettingsManager {
	private readonly settings: Settings;
	private readonly loadErrors: string[];

	private constructor(settings: Settings, loadErrors: string[] = []) {
		this.settings = settings;
		this.loadErrors = loadErrors;
	}

	/**
	 * 创建从文件加载的 SettingsManager。
	 * 全局设置 (~/.tilde/settings.json) 被项目设置 (<cwd>/.tilde/settings.json) 覆盖。
	 */
	static create(cwd: string = process.cwd(), configDir: string = getConfigDir()): SettingsManager {
		const errors: string[] = [];
		const globalSettings = SettingsManager.loadFromFile(getSettingsPath(configDir), errors);
		const projectSettings = SettingsManager.loadFromFile(join(cwd, CONFIG_DIR_NAME, "settings.json"), errors);
		return new SettingsManager(mergeSettings(globalSettings, projectSettings), errors);
	}

	/** 创建内存中的 SettingsManager（无文件 I/O） */
	static inMemory(settings: Settings = {}): SettingsManager {
		return new SettingsManager({ ...settings });
	}

	private static loadFromFile(path: string, errors: string[]): Settings {
		if (!existsSync(path)) {
			return {};
		}
		try {
			const content = readFileSync(path, "utf-8");
			return parseSettings(JSON.parse(content), path, errors);
		} catch (error) {
			errors.push(`${path}: ${error instanceof Error ? error.message : String(error)}`);
			return {};
		}
	}

	/** 加载过程中遇到的问题（由调用方在进入原始模式前报告） */
	getLoadErrors(): string[] {
		return [...this.loadErrors];
	}

	getTabStop(): number {
		return this.settings.tabStop ?? DEFAULT_TAB_STOP;
	}

	getQuitTimes(): number {
		return this.settings.quitTimes ?? DEFAULT_QUIT_TIMES;
	}

	getMessageTimeoutMs(): number {
		return this.settings.messageTimeoutMs ?? DEFAULT_MESSAGE_TIMEOUT_MS;
	}

	getEscapeTimeoutMs(): number {
		return this.settings.escapeTimeoutMs ?? DEFAULT_ESCAPE_TIMEOUT_MS;
	}

	getKeybindings(): EditorKeybindingsConfig {
		return { ...this.settings.keybindings };
	}
}
