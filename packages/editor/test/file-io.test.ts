import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InMemoryFileStore, NodeFileStore, splitLines } from "../src/core/file-io.js";
import { TextBuffer } from "../src/core/text-buffer.js";

describe("splitLines", () => {
	it("does not produce a row after the final newline", () => {
		expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
	});

	it("keeps a last line without a newline", () => {
		expect(splitLines("a\nb")).toEqual(["a", "b"]);
	});

	it("keeps empty lines", () => {
		expect(splitLines("\n\na\n")).toEqual(["", "", "a"]);
	});

	it("strips carriage returns before the newline", () => {
		expect(splitLines("a\r\nb\r\n")).toEqual(["a", "b"]);
		expect(splitLines("a\rb\n")).toEqual(["a\rb"]);
	});

	it("returns no lines for empty content", () => {
		expect(splitLines("")).toEqual([]);
	});
});

describe("NodeFileStore", () => {
	let dir: string;
	const store = new NodeFileStore();

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "tilde-file-io-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("returns no lines for a missing file", async () => {
		await expect(store.loadLines(join(dir, "missing.txt"))).resolves.toEqual([]);
	});

	it("writes bytes and reports the count", async () => {
		const path = join(dir, "out.txt");
		await expect(store.writeBytes(path, "one\ntwo\n")).resolves.toBe(8);
		expect(readFileSync(path, "utf-8")).toBe("one\ntwo\n");
		expect(statSync(path).size).toBe(8);
	});

	it("round-trips bytes outside ASCII unchanged", async () => {
		const path = join(dir, "bytes.txt");
		const original = Buffer.from([0x63, 0x61, 0x66, 0xc3, 0xa9, 0x0a, 0xff, 0x0a]);
		writeFileSync(path, original);

		const buffer = TextBuffer.fromLines(await store.loadLines(path));
		expect(buffer.numrows).toBe(2);
		expect(buffer.row(0)?.size).toBe(5);

		await expect(store.writeBytes(path, buffer.rowsToFlatText())).resolves.toBe(8);
		expect(readFileSync(path).equals(original)).toBe(true);
	});

	it("surfaces errors other than a missing file", async () => {
		await expect(store.loadLines(dir)).rejects.toThrow();
		await expect(store.writeBytes(join(dir, "no", "such", "dir.txt"), "x")).rejects.toThrow();
	});
});

describe("InMemoryFileStore", () => {
	it("stores writes and fails on request", async () => {
		const store = new InMemoryFileStore({ "a.txt": "x\n" });
		await expect(store.loadLines("a.txt")).resolves.toEqual(["x"]);
		await store.writeBytes("b.txt", "y\n");
		expect(store.files.get("b.txt")).toBe("y\n");

		store.failWrites("b.txt", new Error("read-only"));
		await expect(store.writeBytes("b.txt", "z\n")).rejects.toThrow("read-only");
		expect(store.files.get("b.txt")).toBe("y\n");
	});
});
