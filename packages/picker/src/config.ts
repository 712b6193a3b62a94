import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

// =============================================================================
// Package Detection
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Get the package root, the nearest directory above this module holding a
 * package.json. Works from both src/ (tsx, vitest) and dist/.
 */
export function getPackageDir(): string {
	let dir = __dirname;
	while (dir !== dirname(dir)) {
		if (existsSync(join(dir, "package.json"))) {
			return dir;
		}
		dir = dirname(dir);
	}
	// Fallback (shouldn't happen)
	return __dirname;
}

/** Get path to package.json */
export function getPackageJsonPath(): string {
	return join(getPackageDir(), "package.json");
}

// =============================================================================
// App Config (from package.json jpickConfig)
// =============================================================================

interface PackageJson {
	version?: string;
	jpickConfig?: { name?: string };
}

const pkg: PackageJson = JSON.parse(readFileSync(getPackageJsonPath(), "utf-8"));

export const APP_NAME: string = pkg.jpickConfig?.name || "jpick";
export const VERSION: string = pkg.version || "0.0.0";

// e.g., JPICK_TTY
export const ENV_TTY = `${APP_NAME.toUpperCase()}_TTY`;
export const ENV_WRITE_LOG = `${APP_NAME.toUpperCase()}_WRITE_LOG`;

export const DEFAULT_TTY_PATH = "/dev/tty";

// =============================================================================
// Terminal Device
// =============================================================================

/** Get the terminal device the picker draws on */
export function getTtyPath(): string {
	return process.env[ENV_TTY] || DEFAULT_TTY_PATH;
}

/** Get the file that receives a copy of every terminal write, if any */
export function getWriteLogPath(): string | undefined {
	return process.env[ENV_WRITE_LOG] || undefined;
}
