import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { CliCommand } from "../../src/core/types/index.js";
import { parseCLIArgs } from "../../src/shell/config/index.js";

const run = (installPythonDev: boolean): CliCommand => ({
	_tag: "Run",
	options: { installPythonDev },
});

const flagOf = (args: ReadonlyArray<string>): string | null =>
	Either.match(parseCLIArgs(args), {
		onLeft: (error) => error.flag,
		onRight: () => null,
	});

describe("parseCLIArgs: accepted flags", () => {
	it("installs development headers by default", () => {
		expect(parseCLIArgs([])).toEqual(Either.right(run(true)));
	});

	it("-n skips development headers", () => {
		expect(parseCLIArgs(["-n"])).toEqual(Either.right(run(false)));
	});

	it("-h requests help", () => {
		expect(parseCLIArgs(["-h"])).toEqual(Either.right({ _tag: "Help" }));
	});

	it("accepts clustered flags", () => {
		expect(parseCLIArgs(["-nh"])).toEqual(Either.right({ _tag: "Help" }));
	});

	it("reads process.argv when no arguments are passed", () => {
		const original = process.argv;
		try {
			process.argv = ["node", "install-timelord", "-n"];
			expect(parseCLIArgs()).toEqual(Either.right(run(false)));
		} finally {
			process.argv = original;
		}
	});
});

describe("parseCLIArgs: getopts boundaries", () => {
	it("stops at the first operand", () => {
		expect(parseCLIArgs(["extra", "-x"])).toEqual(Either.right(run(true)));
	});

	it("stops at --", () => {
		expect(parseCLIArgs(["-n", "--", "-x"])).toEqual(Either.right(run(false)));
	});
});

describe("parseCLIArgs: rejected flags", () => {
	it("reports the first unknown flag", () => {
		expect(flagOf(["-d"])).toBe("d");
		expect(flagOf(["-nq"])).toBe("q");
	});

	it("rejects long options character by character", () => {
		expect(flagOf(["--help"])).toBe("-");
	});

	it("reports an error before a later -h", () => {
		expect(flagOf(["-x", "-h"])).toBe("x");
	});
});
