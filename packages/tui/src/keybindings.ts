import { type KeyEvent, type KeyId, matchesKey } from "./keys.js";

/**
 * 可绑定到按键的编辑器操作。
 */
export type EditorAction =
	// 光标移动
	| "cursorUp"
	| "cursorDown"
	| "cursorLeft"
	| "cursorRight"
	| "cursorLineStart"
	| "cursorLineEnd"
	| "pageUp"
	| "pageDown"
	// 删除
	| "deleteCharBackward"
	| "deleteCharForward"
	// 文本输入
	| "newLine"
	// 文件和会话
	| "save"
	| "quit"
	| "find"
	// 忽略的按键
	| "refresh"
	// 提示
	| "promptSubmit"
	| "promptCancel";

// 从 keys.ts 重新导出 KeyId
export type { KeyId };

export const EDITOR_ACTIONS: readonly EditorAction[] = [
	"cursorUp",
	"cursorDown",
	"cursorLeft",
	"cursorRight",
	"cursorLineStart",
	"cursorLineEnd",
	"pageUp",
	"pageDown",
	"deleteCharBackward",
	"deleteCharForward",
	"newLine",
	"save",
	"quit",
	"find",
	"refresh",
	"promptSubmit",
	"promptCancel",
];

export function isEditorAction(value: string): value is EditorAction {
	return EDITOR_ACTIONS.some((action) => action === value);
}

/**
 * 编辑器按键绑定配置。
 */
export type EditorKeybindingsConfig = {
	[K in EditorAction]?: KeyId | KeyId[];
};

/**
 * 默认编辑器按键绑定。
 */
export const DEFAULT_EDITOR_KEYBINDINGS: Required<EditorKeybindingsConfig> = {
	// 光标移动
	cursorUp: "up",
	cursorDown: "down",
	cursorLeft: "left",
	cursorRight: "right",
	cursorLineStart: "home",
	cursorLineEnd: "end",
	pageUp: "pageUp",
	pageDown: "pageDown",
	// 删除
	deleteCharBackward: ["backspace", "ctrl+h"],
	deleteCharForward: "delete",
	// 文本输入
	newLine: "enter",
	// 文件和会话
	save: "ctrl+s",
	quit: "ctrl+q",
	find: "ctrl+f",
	refresh: ["ctrl+l", "escape"],
	// 提示
	promptSubmit: "enter",
	promptCancel: "escape",
};

/**
 * 管理编辑器的按键绑定。
 */
export class EditorKeybindingsManager {
	private actionToKeys: Map<EditorAction, KeyId[]>;

	constructor(config: EditorKeybindingsConfig = {}) {
		this.actionToKeys = new Map();
		this.buildMaps(config);
	}

	private buildMaps(config: EditorKeybindingsConfig): void {
		this.actionToKeys.clear();

		// 从默认值开始，再用用户配置覆盖
		for (const action of EDITOR_ACTIONS) {
			const keys = config[action] ?? DEFAULT_EDITOR_KEYBINDINGS[action];
			this.actionToKeys.set(action, Array.isArray(keys) ? [...keys] : [keys]);
		}
	}

	/**
	 * 检查按键是否匹配特定操作。
	 */
	matches(key: KeyEvent, action: EditorAction): boolean {
		const keys = this.actionToKeys.get(action);
		if (!keys) return false;
		for (const keyId of keys) {
			if (matchesKey(key, keyId)) return true;
		}
		return false;
	}

	/**
	 * 获取绑定到操作的按键。
	 */
	getKeys(action: EditorAction): KeyId[] {
		return this.actionToKeys.get(action) ?? [];
	}
}
