import { ExecError } from "../errors.js";
import { exec } from "../utils/exec.js";

/** Modified or staged tracked files make the tree dirty; untracked files do not. */
export async function isWorkingTreeClean(repoPath: string): Promise<boolean> {
	const { stdout } = await exec("git status --porcelain --untracked-files=no", { cwd: repoPath });
	return stdout.trim().length === 0;
}

export async function getCurrentBranch(repoPath: string): Promise<string | null> {
	try {
		const { stdout } = await exec("git symbolic-ref --quiet --short HEAD", { cwd: repoPath });
		return stdout.trim() || null;
	} catch (err) {
		// detached HEAD
		if (err instanceof ExecError && err.code === 1) {
			return null;
		}
		throw err;
	}
}

export async function isGitAvailable(): Promise<boolean> {
	try {
		await exec("git --version");
		return true;
	} catch (err) {
		if (err instanceof ExecError) {
			return false;
		}
		throw err;
	}
}
