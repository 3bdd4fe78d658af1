// CHANGE: Temporary directory helper for filesystem-backed tests
// INVARIANT: cleanup() removes the directory recursively; safe to call twice

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export interface TempDir {
	readonly dir: string;
	readonly cleanup: () => void;
}

export function createTempDir(prefix = "py-altbuild-test-"): TempDir {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
	return {
		dir,
		cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
	};
}

/**
 * Lays out an extracted source tree: `<root>/<name>/configure`.
 */
export function writeSourceTree(root: string, name: string): string {
	const sourceDir = path.join(root, name);
	fs.mkdirSync(sourceDir, { recursive: true });
	fs.writeFileSync(path.join(sourceDir, "configure"), "#!/bin/sh\n");
	return sourceDir;
}
