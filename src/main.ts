// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns the process status as value
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { main as mainEffect } from "./app/runInstaller.js";
import type { HostSystem } from "./shell/system/host.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns process status: 0 on success or help, otherwise the failure's status
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 */
export async function main(
	argv: ReadonlyArray<string> = process.argv.slice(2),
	host?: HostSystem,
): Promise<number> {
	return Effect.runPromise(
		host === undefined ? mainEffect(argv) : mainEffect(argv, host),
	);
}
