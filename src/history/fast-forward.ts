import type { CommitSeries, ForkPoint } from "./types.js";

/**
 * Returns the tip `ontoTip` can be moved to without writing any commit, or null
 * when the series has to be replayed. A merge anywhere between the fork point
 * and the source tip disqualifies the move even if git itself could
 * fast-forward, so merges never reach the target history.
 */
export function tryFastForward(series: CommitSeries, forkPoint: ForkPoint, ontoTip: string): string | null {
	if (series.commits.length === 0 || series.omittedMerges.length > 0) {
		return null;
	}
	if (!forkPoint.target || !forkPoint.source) {
		return null;
	}
	if (forkPoint.target.id !== ontoTip || forkPoint.source.id !== forkPoint.target.id) {
		return null;
	}

	let expectedParent = ontoTip;
	for (const commit of series.commits) {
		if (commit.parents.length !== 1 || commit.parents[0] !== expectedParent) {
			return null;
		}
		expectedParent = commit.id;
	}

	return expectedParent === series.tip ? expectedParent : null;
}
