import { describe, expect, it } from "vitest";
import { parseArgs } from "../src/cli/args.js";

describe("parseArgs", () => {
	it("takes a single file argument", () => {
		expect(parseArgs(["notes.txt"])).toEqual({ errors: [], file: "notes.txt" });
	});

	it("runs without arguments", () => {
		expect(parseArgs([])).toEqual({ errors: [] });
	});

	it("recognises help and version flags", () => {
		expect(parseArgs(["-h"]).help).toBe(true);
		expect(parseArgs(["--help"]).help).toBe(true);
		expect(parseArgs(["-v"]).version).toBe(true);
		expect(parseArgs(["--version"]).version).toBe(true);
	});

	it("treats everything after -- as a file name", () => {
		expect(parseArgs(["--", "-odd-name"])).toEqual({ errors: [], file: "-odd-name" });
	});

	it("reports unknown options and extra arguments", () => {
		expect(parseArgs(["--wat", "a", "b"])).toEqual({
			errors: ["Unknown option: --wat", "Unexpected argument: b"],
			file: "a",
		});
	});
});
