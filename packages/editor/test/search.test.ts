import { charKey, EditorKeybindingsManager, ENTER, namedKey } from "@tilde/tui";
import { describe, expect, it } from "vitest";
import { SearchSession } from "../src/core/search.js";
import { TextBuffer } from "../src/core/text-buffer.js";
import { Viewport } from "../src/core/viewport.js";

function setup(lines: string[]) {
	const buffer = TextBuffer.fromLines(lines);
	const viewport = new Viewport(10, 40);
	const search = new SearchSession(buffer, viewport, new EditorKeybindingsManager());
	return { buffer, viewport, search };
}

describe("SearchSession", () => {
	it("finds forward and wraps around the end of the buffer", () => {
		const { viewport, search } = setup(["foo", "bar", "foo"]);

		expect(search.step("foo", charKey(111))).toBe(0);
		expect(viewport.cy).toBe(0);
		expect(search.step("foo", namedKey("down"))).toBe(2);
		expect(viewport.cy).toBe(2);
		expect(search.step("foo", namedKey("right"))).toBe(0);
		expect(viewport.cy).toBe(0);
	});

	it("searches backward and wraps around the start", () => {
		const { search } = setup(["foo", "bar", "foo"]);
		search.step("o", charKey(111));
		expect(search.step("o", namedKey("up"))).toBe(2);
		expect(search.direction).toBe(-1);
		expect(search.step("o", namedKey("left"))).toBe(0);
	});

	it("restarts from the top when the query changes", () => {
		const { search } = setup(["xa", "ab", "abc"]);
		search.step("a", charKey(97));
		search.step("a", namedKey("down"));
		expect(search.lastMatchRow).toBe(1);
		expect(search.step("ab", charKey(98))).toBe(1);
		expect(search.step("abc", charKey(99))).toBe(2);
	});

	it("puts the cursor on the match in buffer columns", () => {
		const { viewport, search } = setup(["none", "\tneedle"]);
		expect(search.step("needle", charKey(101))).toBe(1);
		expect(viewport.cx).toBe(1);
		expect(viewport.cy).toBe(1);
	});

	it("scrolls the matched row to the top of the window", () => {
		const lines = Array.from({ length: 50 }, (_, i) => (i === 30 ? "target" : "filler"));
		const { buffer, viewport, search } = setup(lines);
		search.step("target", charKey(116));
		expect(viewport.rowoff).toBe(50);
		viewport.scroll(buffer);
		expect(viewport.rowoff).toBe(30);
	});

	it("reports no match without moving the cursor", () => {
		const { viewport, search } = setup(["abc"]);
		viewport.cx = 2;
		expect(search.step("zzz", charKey(122))).toBe(-1);
		expect(viewport.snapshot()).toMatchObject({ cx: 2, cy: 0 });
	});

	it("resets its state when the prompt ends", () => {
		const { search } = setup(["foo", "foo"]);
		search.step("foo", charKey(111));
		search.step("foo", namedKey("down"));
		expect(search.step("foo", charKey(ENTER))).toBe(-1);
		expect(search.lastMatchRow).toBe(-1);
		expect(search.direction).toBe(1);
	});

	it("restores the saved position on cancel", () => {
		const buffer = TextBuffer.fromLines(Array.from({ length: 30 }, (_, i) => (i === 25 ? "hit" : "")));
		const viewport = new Viewport(10, 40);
		viewport.restore({ cx: 0, cy: 3, rowoff: 1, coloff: 0 });
		const search = new SearchSession(buffer, viewport, new EditorKeybindingsManager());

		search.step("hit", charKey(116));
		expect(viewport.cy).toBe(25);

		search.cancel();
		expect(search.state).toBe("cancelled");
		expect(viewport.snapshot()).toEqual({ cx: 0, cy: 3, rowoff: 1, coloff: 0 });
	});

	it("keeps the match position on commit", () => {
		const { viewport, search } = setup(["a", "b", "c"]);
		search.step("c", charKey(99));
		search.commit();
		expect(search.state).toBe("committed");
		expect(viewport.cy).toBe(2);
	});
});
