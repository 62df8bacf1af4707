import { ConflictDuringReplayError, PatchConflictError } from "../errors.js";
import { subjectOf, type Commit, type CommitGraphAccessor } from "../git/types.js";
import type { CommitSeries, ReplayedCommit } from "./types.js";

export type ReplayStepResult =
	| { status: "applied"; original: Commit; replayed: string }
	| { status: "conflict"; original: Commit; cause: PatchConflictError };

export interface ReplayOutcome {
	newTip: string;
	replayed: ReplayedCommit[];
}

export async function replayCommit(
	accessor: CommitGraphAccessor,
	commit: Commit,
	parent: string,
): Promise<ReplayStepResult> {
	const delta = await accessor.diff(commit);
	try {
		const replayed = await accessor.createCommit(parent, delta, {
			author: commit.author,
			message: commit.message,
		});
		return { status: "applied", original: commit, replayed };
	} catch (err) {
		if (err instanceof PatchConflictError) {
			return { status: "conflict", original: commit, cause: err };
		}
		throw err;
	}
}

/**
 * Recreates every commit of `series` on top of `ontoTip`, oldest first, keeping
 * author, authored date and message. No ref is moved here; on a conflict the
 * commits written so far are left unreferenced.
 */
export async function replay(
	accessor: CommitGraphAccessor,
	series: CommitSeries,
	ontoTip: string,
	branch: string,
	onStep?: (step: ReplayedCommit, commit: Commit) => void,
): Promise<ReplayOutcome> {
	let tip = ontoTip;
	const replayed: ReplayedCommit[] = [];

	for (const commit of series.commits) {
		const result = await replayCommit(accessor, commit, tip);
		if (result.status === "conflict") {
			throw new ConflictDuringReplayError(commit.id, subjectOf(commit), branch, result.cause);
		}
		const step = { original: commit.id, replayed: result.replayed };
		replayed.push(step);
		onStep?.(step, commit);
		tip = result.replayed;
	}

	return { newTip: tip, replayed };
}
