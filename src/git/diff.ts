import { exec } from "../utils/exec.js";

/**
 * Patch for a single-parent (or root) commit against its parent. Full blob ids
 * and binary hunks are included so the output can be fed to `git apply`.
 */
export async function getCommitPatch(repoPath: string, commitSha: string): Promise<string> {
	const { stdout } = await exec(
		`git diff-tree -p -r --root --binary --full-index --no-commit-id --no-renames --no-ext-diff ${commitSha}`,
		{ cwd: repoPath },
	);
	return stdout;
}
