import { UnknownBranchError } from "../errors.js";
import { getCommitPatch } from "./diff.js";
import { listFirstParentCommits } from "./log.js";
import {
	checkoutTreeChange,
	createReplayCommit,
	getGitDir,
	isValidBranchName,
	resolveBranchSha,
	updateBranchRef,
} from "./plumbing.js";
import { getCurrentBranch, isWorkingTreeClean } from "./status.js";
import type { Commit, CommitDelta, CommitGraphAccessor, CommitMetadata } from "./types.js";

export class GitAccessor implements CommitGraphAccessor {
	readonly repoPath: string;
	private gitDir: string | undefined;
	private readonly historyCache = new Map<string, Commit[]>();

	constructor(repoPath: string) {
		this.repoPath = repoPath;
	}

	async resolveBranch(name: string): Promise<string | null> {
		if (!isValidBranchName(name)) {
			throw new UnknownBranchError(name, "is not a valid branch name");
		}
		return resolveBranchSha(this.repoPath, name);
	}

	currentBranch(): Promise<string | null> {
		return getCurrentBranch(this.repoPath);
	}

	async listCommits(ref: string): Promise<Commit[]> {
		const cached = this.historyCache.get(ref);
		if (cached) {
			return cached;
		}
		const commits = await listFirstParentCommits(this.repoPath, ref);
		// Only full object ids are immutable; branch names may move.
		if (/^[0-9a-f]{40}$/.test(ref)) {
			this.historyCache.set(ref, commits);
		}
		return commits;
	}

	async diff(commit: Commit): Promise<CommitDelta> {
		const patch = await getCommitPatch(this.repoPath, commit.id);
		return { commitId: commit.id, patch };
	}

	isMerge(commit: Commit): boolean {
		return commit.parents.length > 1;
	}

	async createCommit(parent: string, delta: CommitDelta, metadata: CommitMetadata): Promise<string> {
		this.gitDir ??= await getGitDir(this.repoPath);
		return createReplayCommit({
			repoPath: this.repoPath,
			gitDir: this.gitDir,
			parentSha: parent,
			patch: delta.patch,
			metadata,
		});
	}

	async moveRef(branch: string, newTip: string, expectedOldTip: string): Promise<void> {
		if ((await this.currentBranch()) !== branch) {
			await updateBranchRef(this.repoPath, branch, newTip, expectedOldTip);
			return;
		}

		// a checked-out branch moves together with its index and working tree
		await checkoutTreeChange(this.repoPath, branch, expectedOldTip, newTip, { dryRun: true });
		await updateBranchRef(this.repoPath, branch, newTip, expectedOldTip);
		try {
			await checkoutTreeChange(this.repoPath, branch, expectedOldTip, newTip);
		} catch (err) {
			await updateBranchRef(this.repoPath, branch, expectedOldTip, newTip);
			throw err;
		}
	}

	currentBranchIsClean(): Promise<boolean> {
		return isWorkingTreeClean(this.repoPath);
	}
}
