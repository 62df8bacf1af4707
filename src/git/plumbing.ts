import { randomBytes } from "node:crypto";
import { unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ExecError, PatchConflictError, RefUpdateRejectedError, WorkingTreeUpdateError } from "../errors.js";
import { exec } from "../utils/exec.js";
import type { CommitMetadata } from "./types.js";

const BRANCH_NAME_REGEX = /^[a-zA-Z0-9._/-]+$/;

export interface CreateReplayCommitOpts {
	repoPath: string;
	gitDir: string;
	parentSha: string;
	patch: string;
	metadata: CommitMetadata;
}

export function isValidBranchName(name: string): boolean {
	return BRANCH_NAME_REGEX.test(name) && !name.includes("..") && !name.startsWith("-");
}

export async function getGitDir(repoPath: string): Promise<string> {
	const { stdout } = await exec("git rev-parse --absolute-git-dir", { cwd: repoPath });
	return stdout.trim();
}

function tempPath(gitDir: string, prefix: string): string {
	return join(gitDir, `${prefix}.${randomBytes(8).toString("hex")}`);
}

async function removeTemp(path: string): Promise<void> {
	await unlink(path).catch((err: NodeJS.ErrnoException) => {
		if (err.code !== "ENOENT") {
			throw err;
		}
	});
}

/**
 * Applies `patch` to the tree of `parentSha` in a private index and writes a
 * commit on top of it. The user's index and working tree are never touched.
 */
export async function createReplayCommit(opts: CreateReplayCommitOpts): Promise<string> {
	const { repoPath, gitDir, parentSha, patch, metadata } = opts;

	const tempIndex = tempPath(gitDir, "index.replay");
	const patchFile = tempPath(gitDir, "replay-patch");
	const messageFile = tempPath(gitDir, "replay-msg");
	const env = { ...process.env, GIT_INDEX_FILE: tempIndex };

	try {
		await exec(`git read-tree ${parentSha}`, { cwd: repoPath, env });

		if (patch.trim().length > 0) {
			await writeFile(patchFile, patch);
			try {
				await exec(`git apply --cached --binary "${patchFile}"`, { cwd: repoPath, env });
			} catch (err) {
				if (err instanceof ExecError) {
					const detail = err.stderr.trim().split("\n")[0] ?? "git apply failed";
					throw new PatchConflictError(parentSha, detail);
				}
				throw err;
			}
		}

		const { stdout: treeOut } = await exec("git write-tree", { cwd: repoPath, env });
		const treeSha = treeOut.trim();

		await writeFile(messageFile, `${metadata.message}\n`);
		const { stdout: commitOut } = await exec(`git commit-tree ${treeSha} -p ${parentSha} -F "${messageFile}"`, {
			cwd: repoPath,
			env: {
				...process.env,
				GIT_AUTHOR_NAME: metadata.author.name,
				GIT_AUTHOR_EMAIL: metadata.author.email,
				GIT_AUTHOR_DATE: metadata.author.date,
			},
		});
		return commitOut.trim();
	} finally {
		await removeTemp(tempIndex);
		await removeTemp(patchFile);
		await removeTemp(messageFile);
	}
}

export async function resolveBranchSha(repoPath: string, branch: string): Promise<string | null> {
	try {
		const { stdout } = await exec(`git rev-parse --verify --quiet "refs/heads/${branch}^{commit}"`, {
			cwd: repoPath,
		});
		return stdout.trim() || null;
	} catch (err) {
		if (err instanceof ExecError) {
			return null;
		}
		throw err;
	}
}

/** Compare-and-swap update of `refs/heads/<branch>`. */
export async function updateBranchRef(
	repoPath: string,
	branch: string,
	newSha: string,
	expectedOldSha: string,
): Promise<void> {
	try {
		await exec(`git update-ref -m "split-reconcile: move ${branch}" refs/heads/${branch} ${newSha} ${expectedOldSha}`, {
			cwd: repoPath,
		});
	} catch (err) {
		if (err instanceof ExecError) {
			throw new RefUpdateRejectedError(branch, expectedOldSha);
		}
		throw err;
	}
}

function firstErrorLine(err: ExecError): string {
	const line = err.stderr
		.split("\n")
		.map((l) => l.trim())
		.find((l) => l.length > 0);
	return (line ?? "git read-tree failed").replace(/^error: /, "");
}

/**
 * Moves the index and working tree of the checked-out branch from one commit to
 * another. With `dryRun` only reports whether the move would succeed, touching
 * nothing.
 */
export async function checkoutTreeChange(
	repoPath: string,
	branch: string,
	fromSha: string,
	toSha: string,
	opts: { dryRun?: boolean } = {},
): Promise<void> {
	const flags = opts.dryRun ? "-m -u -n" : "-m -u";
	try {
		await exec(`git read-tree ${flags} ${fromSha} ${toSha}`, { cwd: repoPath });
	} catch (err) {
		if (err instanceof ExecError) {
			throw new WorkingTreeUpdateError(branch, firstErrorLine(err));
		}
		throw err;
	}
}
