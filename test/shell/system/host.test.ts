import * as fs from "node:fs";
import * as path from "node:path";
import { describe, expect, it } from "vitest";

import {
	createNodeHost,
	isOnPath,
	probePlatform,
} from "../../../src/shell/system/host.js";
import { createTempProject } from "../../utils/tempProject.js";

function writeTool(dir: string, name: string, mode: number): void {
	fs.mkdirSync(dir, { recursive: true });
	fs.writeFileSync(path.join(dir, name), "#!/bin/sh\n", { mode });
}

describe("isOnPath", () => {
	it("finds executables in any PATH entry", () => {
		const t = createTempProject();
		try {
			const bin = path.join(t.cwd, "bin");
			writeTool(bin, "apt-get", 0o755);
			const searchPath = [path.join(t.cwd, "empty"), bin].join(path.delimiter);

			expect(isOnPath("apt-get", searchPath)).toBe(true);
			expect(isOnPath("yum", searchPath)).toBe(false);
		} finally {
			t.cleanup();
		}
	});

	it("ignores files without the execute bit", () => {
		const t = createTempProject();
		try {
			writeTool(t.cwd, "dnf", 0o644);
			expect(isOnPath("dnf", t.cwd)).toBe(false);
		} finally {
			t.cleanup();
		}
	});

	it("treats an unset PATH as empty", () => {
		expect(isOnPath("sh", undefined)).toBe(false);
		expect(isOnPath("sh", "")).toBe(false);
	});
});

describe("createNodeHost", () => {
	it("probes package managers from the configured PATH", () => {
		const t = createTempProject();
		try {
			const bin = path.join(t.cwd, "bin");
			writeTool(bin, "yum", 0o755);
			const host = createNodeHost({ cwd: t.cwd, env: { PATH: bin }, osName: "linux" });

			expect(probePlatform(host)).toEqual({
				osName: "linux",
				hasAptGet: false,
				hasDnf: false,
				hasYum: true,
			});
		} finally {
			t.cleanup();
		}
	});

	it("resolves relative paths against its working directory", () => {
		const t = createTempProject({ withBenchmark: true });
		try {
			const host = createNodeHost({ cwd: t.cwd, env: {} });
			fs.symlinkSync("missing-target", path.join(t.cwd, "dangling"));

			expect(host.pathExists("venv/lib/python3.11/site-packages/vdf_bench")).toBe(true);
			expect(host.pathExists("dangling")).toBe(false);
			expect(host.entryExists("dangling")).toBe(true);
			expect(host.entryExists("absent")).toBe(false);
		} finally {
			t.cleanup();
		}
	});
});
