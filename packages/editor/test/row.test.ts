import { describe, expect, it } from "vitest";
import { cxToRx, Row, rxToCx } from "../src/core/row.js";

describe("Row", () => {
	it("expands tabs to the next tab stop in render", () => {
		expect(new Row("\tx").render).toBe(`${" ".repeat(8)}x`);
		expect(new Row("abc\td").render).toBe("abc     d");
		expect(new Row("a\tb", 4).render).toBe("a   b");
	});

	it("regenerates render after every mutation", () => {
		const row = new Row("ab");
		row.insertChar(1, "\t");
		expect(row.chars).toBe("a\tb");
		expect(row.render).toBe("a       b");
		row.deleteChar(1);
		expect(row.render).toBe("ab");
		row.append("\t");
		expect(row.render).toBe(`ab${" ".repeat(6)}`);
		expect(row.truncate(1)).toBe("b\t");
		expect(row.render).toBe("a");
	});

	it("appends when inserting out of range", () => {
		const row = new Row("ab");
		row.insertChar(10, "c");
		row.insertChar(-1, "d");
		expect(row.chars).toBe("abcd");
	});

	it("ignores deletes out of range", () => {
		const row = new Row("ab");
		row.deleteChar(2);
		row.deleteChar(-1);
		expect(row.chars).toBe("ab");
	});
});

describe("cxToRx", () => {
	it("advances a tab at column 0 to column 8", () => {
		const row = new Row("\tx");
		expect(cxToRx(row, 0)).toBe(0);
		expect(cxToRx(row, 1)).toBe(8);
		expect(cxToRx(row, 2)).toBe(9);
	});

	it("advances a tab at column 3 to column 8", () => {
		const row = new Row("abc\tx");
		expect(cxToRx(row, 3)).toBe(3);
		expect(cxToRx(row, 4)).toBe(8);
	});

	it("advances a tab at column 8 to column 16", () => {
		const row = new Row("abcdefgh\tx");
		expect(cxToRx(row, 9)).toBe(16);
		expect(cxToRx(row, 10)).toBe(17);
	});

	it("honours a custom tab stop", () => {
		expect(cxToRx(new Row("ab\tc", 4), 3)).toBe(4);
	});
});

describe("rxToCx", () => {
	it("inverts cxToRx on rows without tabs", () => {
		const row = new Row("hello world");
		for (let cx = 0; cx <= row.size; cx++) {
			expect(rxToCx(row, cxToRx(row, cx))).toBe(cx);
		}
	});

	it("maps columns inside a tab to the tab", () => {
		const row = new Row("a\tb");
		expect(rxToCx(row, 0)).toBe(0);
		expect(rxToCx(row, 1)).toBe(1);
		expect(rxToCx(row, 7)).toBe(1);
		expect(rxToCx(row, 8)).toBe(2);
	});

	it("returns the row length past the end", () => {
		expect(rxToCx(new Row("abc"), 50)).toBe(3);
		expect(rxToCx(new Row(""), 0)).toBe(0);
	});
});
