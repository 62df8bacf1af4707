export interface CommitAuthor {
	name: string;
	email: string;
	/** ISO 8601, with the original timezone offset. */
	date: string;
}

export interface Commit {
	id: string;
	parents: string[];
	author: CommitAuthor;
	message: string;
}

/**
 * The change a commit makes against its single parent, or against the empty
 * tree for a root commit.
 */
export interface CommitDelta {
	commitId: string;
	patch: string;
}

export interface CommitMetadata {
	author: CommitAuthor;
	message: string;
}

/**
 * Read/write view over the repository. Every implementation is driven
 * sequentially: callers await each call before issuing the next.
 */
export interface CommitGraphAccessor {
	resolveBranch(name: string): Promise<string | null>;
	currentBranch(): Promise<string | null>;
	/** First-parent history, newest first. */
	listCommits(ref: string): Promise<Commit[]>;
	diff(commit: Commit): Promise<CommitDelta>;
	isMerge(commit: Commit): boolean;
	/** Throws PatchConflictError when `delta` does not apply on `parent`. */
	createCommit(parent: string, delta: CommitDelta, metadata: CommitMetadata): Promise<string>;
	/** Atomic: fails if `branch` no longer points at `expectedOldTip`. */
	moveRef(branch: string, newTip: string, expectedOldTip: string): Promise<void>;
	currentBranchIsClean(): Promise<boolean>;
}

export function subjectOf(commit: Pick<Commit, "message">): string {
	return commit.message.split("\n", 1)[0] ?? "";
}
