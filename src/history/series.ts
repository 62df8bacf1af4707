import type { Commit, CommitGraphAccessor } from "../git/types.js";
import type { CommitSeries } from "./types.js";

/**
 * Collects the first-parent history of `branchTip` down to `stopAt`
 * (exclusive; null walks to the root), oldest first.
 *
 * Merge commits are left out entirely. Their side-branch content is dropped,
 * not linearised: only the first-parent line is replayed.
 */
export async function buildSeries(
	accessor: CommitGraphAccessor,
	branchTip: string,
	stopAt: string | null,
): Promise<CommitSeries> {
	const history = await accessor.listCommits(branchTip);

	const newestFirst: Commit[] = [];
	const omittedMerges: Commit[] = [];
	let reachedStop = stopAt === null;

	for (const commit of history) {
		if (commit.id === stopAt) {
			reachedStop = true;
			break;
		}
		if (accessor.isMerge(commit)) {
			omittedMerges.push(commit);
			continue;
		}
		newestFirst.push(commit);
	}

	if (!reachedStop) {
		throw new Error(`${stopAt} is not on the first-parent history of ${branchTip}`);
	}

	return {
		commits: newestFirst.reverse(),
		omittedMerges,
		tip: branchTip,
		stopAt,
	};
}
