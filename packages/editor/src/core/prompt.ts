import { type EditorKeybindingsManager, isPrintable, type KeyEvent } from "@tilde/tui";

export type PromptStep =
	| { kind: "continue"; input: string }
	| { kind: "submit"; input: string }
	| { kind: "cancel" };

/**
 * 把提示模板中的 `%s` 替换为当前输入
 */
export function formatPrompt(template: string, input: string): string {
	return template.replace("%s", () => input);
}

/**
 * 提示行中一次按键的效果：删除键移除最后一个字符，取消键放弃，
 * 提交键仅在输入非空时提交，其他可打印 ASCII 字符追加到输入。
 */
export function applyPromptKey(input: string, key: KeyEvent, bindings: EditorKeybindingsManager): PromptStep {
	if (bindings.matches(key, "deleteCharBackward") || bindings.matches(key, "deleteCharForward")) {
		return { kind: "continue", input: input.slice(0, -1) };
	}
	if (bindings.matches(key, "promptCancel")) {
		return { kind: "cancel" };
	}
	if (bindings.matches(key, "promptSubmit")) {
		if (input.length > 0) {
			return { kind: "submit", input };
		}
		return { kind: "continue", input };
	}
	if (key.type === "char" && isPrintable(key)) {
		return { kind: "continue", input: input + String.fromCharCode(key.code) };
	}
	return { kind: "continue", input };
}
