import { Option } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	parsePoetryVersion,
	parsePythonVersion,
	pinRequirement,
} from "../../src/core/version.js";

describe("parsePythonVersion", () => {
	it("accepts the interpreter label with a trailing newline", () => {
		expect(parsePythonVersion("python3.11\n")).toEqual(Option.some("python3.11"));
	});

	it("rejects anything else", () => {
		expect(Option.isNone(parsePythonVersion(""))).toBe(true);
		expect(Option.isNone(parsePythonVersion("Python 3.11.4"))).toBe(true);
		expect(Option.isNone(parsePythonVersion("python3"))).toBe(true);
	});

	it("round-trips any major.minor pair", () => {
		fc.assert(
			fc.property(fc.nat(99), fc.nat(99), (major, minor) => {
				const label = `python${major}.${minor}`;
				expect(parsePythonVersion(`${label}\n`)).toEqual(Option.some(label));
			}),
		);
	});
});

describe("parsePoetryVersion", () => {
	it("reads the version line of poetry show", () => {
		const output = [
			"name         : chiavdf",
			"version      : 1.1.4",
			"description  : Chia vdf verification (wraps C++)",
		].join("\n");
		expect(parsePoetryVersion(output)).toEqual(Option.some("1.1.4"));
	});

	it("accepts indentation and no padding before the colon", () => {
		expect(parsePoetryVersion(" version: 1.0.11\r\n")).toEqual(Option.some("1.0.11"));
	});

	it("skips an empty version line", () => {
		expect(parsePoetryVersion("version      : \nversion : 2.0.0\n")).toEqual(
			Option.some("2.0.0"),
		);
	});

	it("returns None when no version line is present", () => {
		expect(Option.isNone(parsePoetryVersion("name : chiavdf\n"))).toBe(true);
		expect(Option.isNone(parsePoetryVersion(""))).toBe(true);
	});

	it("never yields an empty or padded version", () => {
		fc.assert(
			fc.property(fc.string(), (text) => {
				const result = parsePoetryVersion(text);
				if (Option.isSome(result)) {
					expect(result.value.length).toBeGreaterThan(0);
					expect(result.value.trim()).toBe(result.value);
				}
			}),
		);
	});
});

describe("pinRequirement", () => {
	it("joins name and version with ==", () => {
		expect(pinRequirement("chiavdf", "1.1.4")).toBe("chiavdf==1.1.4");
	});
});
