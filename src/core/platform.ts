// PURITY: CORE
// INVARIANT: probe order is Debian → RedHat → macOS; first match wins
// COMPLEXITY: O(1)

import type { Platform, PlatformProbe } from "./models.js";

/**
 * Classifies the host from probe facts.
 *
 * @param probe - OS name and package-manager availability
 * @returns exactly one Platform variant
 *
 * @pure true
 * @invariant linux ∧ apt-get → debian; linux ∧ (dnf ∨ yum) → redhat; darwin → macos; else unknown
 * @complexity O(1)
 *
 * @example
 * ```ts
 * detectPlatform({ osName: "linux", hasAptGet: false, hasDnf: true, hasYum: true });
 * // { kind: "redhat", manager: "dnf" }
 * ```
 */
export function detectPlatform(probe: PlatformProbe): Platform {
	if (probe.osName === "linux" && probe.hasAptGet) {
		return { kind: "debian" };
	}
	if (probe.osName === "linux" && (probe.hasDnf || probe.hasYum)) {
		return { kind: "redhat", manager: probe.hasDnf ? "dnf" : "yum" };
	}
	if (probe.osName === "darwin") {
		return { kind: "macos" };
	}
	return { kind: "unknown" };
}

/**
 * Line printed once the platform is known, null for an unknown host.
 *
 * @pure true
 * @complexity O(1)
 */
export function platformBanner(platform: Platform): string | null {
	switch (platform.kind) {
		case "debian":
			return "Found Ubuntu/Debian.";
		case "redhat":
			return "Found RedHat.";
		case "macos":
			return "Found MacOS.";
		case "unknown":
			return null;
	}
}
