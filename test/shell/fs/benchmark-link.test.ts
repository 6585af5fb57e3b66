import { Effect } from "effect";
import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_CONFIG } from "../../../src/core/types/config.js";
import { linkBenchmark } from "../../../src/shell/fs/benchmark-link.js";
import { createNodeHost } from "../../../src/shell/system/host.js";
import { createTempProject } from "../../utils/tempProject.js";

const TARGET = "venv/lib/python3.11/site-packages/vdf_bench";

describe("linkBenchmark on a real working directory", () => {
	afterEach((): void => {
		vi.restoreAllMocks();
	});

	it("creates a relative symlink when the benchmark exists", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {
			// sink
		});
		const t = createTempProject({ withBenchmark: true });
		try {
			const host = createNodeHost({ cwd: t.cwd, env: {} });
			const outcome = await Effect.runPromise(
				linkBenchmark(host, DEFAULT_CONFIG, "python3.11"),
			);
			const link = path.join(t.cwd, "vdf_bench");

			expect(outcome).toEqual({ _tag: "Created", target: TARGET, link: "vdf_bench" });
			expect(fs.lstatSync(link).isSymbolicLink()).toBe(true);
			expect(fs.readlinkSync(link)).toBe(TARGET);
			expect(log).toHaveBeenCalledWith(`$ ln -s ${TARGET} .`);
		} finally {
			t.cleanup();
		}
	});

	it("leaves an existing link alone", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {
			// sink
		});
		const t = createTempProject({ withBenchmark: true });
		try {
			const host = createNodeHost({ cwd: t.cwd, env: {} });
			await Effect.runPromise(linkBenchmark(host, DEFAULT_CONFIG, "python3.11"));
			const second = await Effect.runPromise(
				linkBenchmark(host, DEFAULT_CONFIG, "python3.11"),
			);

			expect(second).toEqual({ _tag: "AlreadyLinked", link: "vdf_bench" });
			expect(log).toHaveBeenLastCalledWith("./vdf_bench link exists.");
		} finally {
			t.cleanup();
		}
	});

	it("reports a missing benchmark without touching the directory", async () => {
		const err = vi.spyOn(console, "error").mockImplementation(() => {
			// sink
		});
		const t = createTempProject();
		try {
			const host = createNodeHost({ cwd: t.cwd, env: {} });
			const outcome = await Effect.runPromise(
				linkBenchmark(host, DEFAULT_CONFIG, "python3.11"),
			);

			expect(outcome).toEqual({ _tag: "BenchmarkMissing", target: TARGET });
			expect(err).toHaveBeenCalledWith(`ERROR: Could not find ${TARGET}`);
			expect(fs.readdirSync(t.cwd)).toEqual([]);
		} finally {
			t.cleanup();
		}
	});
});
