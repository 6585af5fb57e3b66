import { Effect, Either } from "effect";
import * as os from "node:os";
import { describe, expect, it } from "vitest";

import { captureCommand, runCommand } from "../../../src/shell/utils/exec.js";

const MISSING = { command: "timelord-installer-no-such-tool", args: ["--version"] };
const options = { cwd: os.tmpdir(), env: { PATH: "" } };

describe("command runners: spawn failures", () => {
	it("captureCommand maps a missing executable to status 127", async () => {
		const result = await Effect.runPromise(Effect.either(captureCommand(MISSING, options)));
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.exitCode).toBe(127);
			expect(result.left.command).toBe("timelord-installer-no-such-tool --version");
		}
	});

	it("runCommand maps a missing executable to status 127", async () => {
		const result = await Effect.runPromise(Effect.either(runCommand(MISSING, options)));
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.exitCode).toBe(127);
		}
	});
});

describe("command runners: exit status of a started command", () => {
	const sh = (script: string) => ({ command: "/bin/sh", args: ["-c", script] });

	it("runCommand carries a non-zero exit status", async () => {
		const result = await Effect.runPromise(Effect.either(runCommand(sh("exit 3"), options)));
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.exitCode).toBe(3);
			expect(result.left.command).toBe("/bin/sh -c exit 3");
		}
	});

	it("runCommand reports death by SIGTERM as 143", async () => {
		const result = await Effect.runPromise(
			Effect.either(runCommand(sh("kill -TERM $$"), options)),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.exitCode).toBe(143);
		}
	});

	it("captureCommand carries a non-zero exit status", async () => {
		const result = await Effect.runPromise(
			Effect.either(captureCommand(sh("echo out; exit 4"), options)),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.exitCode).toBe(4);
		}
	});

	it("captureCommand reports death by SIGTERM as 143", async () => {
		const result = await Effect.runPromise(
			Effect.either(captureCommand(sh("kill -TERM $$"), options)),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.exitCode).toBe(143);
		}
	});

	it("captureCommand returns stdout on success", async () => {
		const result = await Effect.runPromise(captureCommand(sh("echo out"), options));
		expect(result).toBe("out\n");
	});
});
