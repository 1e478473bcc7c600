import { describe, expect, it } from "vitest";
import { decodeKeys, KeyDecoder } from "../src/key-decoder.js";
import { charKey, namedKey } from "../src/keys.js";

function bytes(text: string): number[] {
	return [...Buffer.from(text, "latin1")];
}

describe("KeyDecoder", () => {
	it("maps plain bytes to themselves", () => {
		expect(decodeKeys(bytes("a\r\x11"))).toEqual([charKey(97), charKey(13), charKey(17)]);
	});

	it("decodes arrow and home/end letter sequences", () => {
		expect(decodeKeys(bytes("\x1b[A\x1b[B\x1b[C\x1b[D\x1b[H\x1b[F"))).toEqual([
			namedKey("up"),
			namedKey("down"),
			namedKey("right"),
			namedKey("left"),
			namedKey("home"),
			namedKey("end"),
		]);
	});

	it("decodes numeric CSI sequences closed by ~", () => {
		expect(decodeKeys(bytes("\x1b[1~\x1b[3~\x1b[4~\x1b[5~\x1b[6~\x1b[7~\x1b[8~"))).toEqual([
			namedKey("home"),
			namedKey("delete"),
			namedKey("end"),
			namedKey("pageUp"),
			namedKey("pageDown"),
			namedKey("home"),
			namedKey("end"),
		]);
	});

	it("decodes SS3 home and end", () => {
		expect(decodeKeys(bytes("\x1bOH\x1bOF"))).toEqual([namedKey("home"), namedKey("end")]);
	});

	it("resolves unrecognized sequences to escape and drops their bytes", () => {
		expect(decodeKeys(bytes("\x1b[2~x"))).toEqual([namedKey("escape"), charKey(120)]);
		expect(decodeKeys(bytes("\x1b[Zy"))).toEqual([namedKey("escape"), charKey(121)]);
		expect(decodeKeys(bytes("\x1bOAz"))).toEqual([namedKey("escape"), charKey(122)]);
		expect(decodeKeys(bytes("\x1bab"))).toEqual([namedKey("escape")]);
		expect(decodeKeys(bytes("\x1b[5x"))).toEqual([namedKey("escape")]);
	});

	it("resolves a lone escape on timeout", () => {
		const decoder = new KeyDecoder();
		expect(decoder.feed(0x1b)).toBeUndefined();
		expect(decoder.pending).toBe(true);
		expect(decoder.timeout()).toEqual(namedKey("escape"));
		expect(decoder.pending).toBe(false);
	});

	it("resolves a half-read sequence on timeout", () => {
		const decoder = new KeyDecoder();
		decoder.feed(0x1b);
		decoder.feed("[".charCodeAt(0));
		expect(decoder.getState()).toEqual({ kind: "escapeByte", first: 91 });
		expect(decoder.timeout()).toEqual(namedKey("escape"));
		expect(decoder.getState()).toEqual({ kind: "normal" });
	});

	it("tracks the digit state of a numeric sequence", () => {
		const decoder = new KeyDecoder();
		for (const byte of bytes("\x1b[5")) decoder.feed(byte);
		expect(decoder.getState()).toEqual({ kind: "csiDigit", digit: 53 });
		expect(decoder.feed("~".charCodeAt(0))).toEqual(namedKey("pageUp"));
	});

	it("returns nothing on timeout when idle", () => {
		expect(new KeyDecoder().timeout()).toBeUndefined();
	});
});
