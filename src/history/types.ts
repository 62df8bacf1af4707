import type { Commit, CommitGraphAccessor } from "../git/types.js";

export type PatchFingerprint = string;

export interface CommitSeries {
	/** Oldest first. Never contains a merge. */
	commits: Commit[];
	/** Merges met between `stopAt` and `tip`, newest first. */
	omittedMerges: Commit[];
	tip: string;
	stopAt: string | null;
}

/**
 * `target` is where the target branch agrees with the source; `source` is the
 * content-equivalent commit on the source side. Both are null when the
 * histories share nothing and the fork point is the empty root.
 */
export interface ForkPoint {
	target: Commit | null;
	source: Commit | null;
	/** Position of `source` in the source's first-parent history (merges included), oldest first; -1 at the root. */
	sourceIndex: number;
	matchedBy: "identity" | "fingerprint" | "none";
}

export interface ReplayedCommit {
	original: string;
	replayed: string;
}

export interface ReconcileResult {
	branch: string;
	previousTip: string;
	newTip: string;
	forkPoint: ForkPoint;
	/** Commits unique to the source, whether fast-forwarded or replayed. */
	seriesLength: number;
	commitsReplayed: number;
	replayed: ReplayedCommit[];
	fastForwarded: boolean;
	noop: boolean;
	omittedMerges: string[];
}

export interface ReconcileContext {
	accessor: CommitGraphAccessor;
	repoPath: string;
	verbose?: boolean;
	requireCleanTree?: boolean;
	log?: (line: string) => void;
}
