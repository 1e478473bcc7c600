import { charKey, ctrlKey, EditorKeybindingsManager, ENTER, namedKey, TAB } from "@tilde/tui";
import { describe, expect, it } from "vitest";
import { applyPromptKey, formatPrompt } from "../src/core/prompt.js";

const bindings = new EditorKeybindingsManager();

describe("formatPrompt", () => {
	it("substitutes the input for %s", () => {
		expect(formatPrompt("Save as: %s (ESC to cancel)", "a.txt")).toBe("Save as: a.txt (ESC to cancel)");
	});

	it("shows dollar sequences in the input literally", () => {
		expect(formatPrompt("Search: %s (x)", "a$&b")).toBe("Search: a$&b (x)");
		expect(formatPrompt("Search: %s (x)", "$$")).toBe("Search: $$ (x)");
		expect(formatPrompt("Search: %s (x)", "$`$'")).toBe("Search: $`$' (x)");
	});
});

describe("applyPromptKey", () => {
	it("appends printable characters", () => {
		expect(applyPromptKey("ab", charKey(99), bindings)).toEqual({ kind: "continue", input: "abc" });
		expect(applyPromptKey("", charKey(32), bindings)).toEqual({ kind: "continue", input: " " });
	});

	it("ignores control and named keys", () => {
		expect(applyPromptKey("ab", charKey(TAB), bindings)).toEqual({ kind: "continue", input: "ab" });
		expect(applyPromptKey("ab", namedKey("up"), bindings)).toEqual({ kind: "continue", input: "ab" });
		expect(applyPromptKey("ab", charKey(200), bindings)).toEqual({ kind: "continue", input: "ab" });
	});

	it("removes the last character on any delete key", () => {
		expect(applyPromptKey("abc", charKey(127), bindings)).toEqual({ kind: "continue", input: "ab" });
		expect(applyPromptKey("abc", charKey(ctrlKey("h")), bindings)).toEqual({ kind: "continue", input: "ab" });
		expect(applyPromptKey("abc", namedKey("delete"), bindings)).toEqual({ kind: "continue", input: "ab" });
		expect(applyPromptKey("", charKey(127), bindings)).toEqual({ kind: "continue", input: "" });
	});

	it("cancels on escape", () => {
		expect(applyPromptKey("abc", namedKey("escape"), bindings)).toEqual({ kind: "cancel" });
	});

	it("submits only non-empty input", () => {
		expect(applyPromptKey("abc", charKey(ENTER), bindings)).toEqual({ kind: "submit", input: "abc" });
		expect(applyPromptKey("", charKey(ENTER), bindings)).toEqual({ kind: "continue", input: "" });
	});

	it("follows custom bindings", () => {
		const custom = new EditorKeybindingsManager({ promptCancel: "ctrl+g" });
		expect(applyPromptKey("abc", charKey(ctrlKey("g")), custom)).toEqual({ kind: "cancel" });
		expect(applyPromptKey("abc", namedKey("escape"), custom)).toEqual({ kind: "continue", input: "abc" });
	});
});
