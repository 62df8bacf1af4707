import type { Commit, CommitGraphAccessor } from "../git/types.js";
import type { PatchFingerprinter } from "./fingerprint.js";
import type { ForkPoint, PatchFingerprint } from "./types.js";

const ROOT_FORK_POINT: ForkPoint = { target: null, source: null, sourceIndex: -1, matchedBy: "none" };

/**
 * Finds the newest commit on the target's first-parent line that the source
 * also carries. A commit the source has itself (merges included) matches by
 * identity; otherwise a non-merge commit matches by content, so branches whose
 * ancestry was severed by a history rewrite still line up.
 *
 * When the matching change occurs several times in the source, the occurrence
 * whose preceding commits agree with the target's for longest is used, and the
 * oldest of those on a tie. Nothing between the fork point and the source tip
 * is skipped.
 */
export async function resolveForkPoint(
	accessor: CommitGraphAccessor,
	fingerprinter: PatchFingerprinter,
	sourceTip: string,
	targetTip: string,
): Promise<ForkPoint> {
	const sourceHistory = await accessor.listCommits(sourceTip);
	const targetHistory = await accessor.listCommits(targetTip);

	// oldest first, merges included
	const sourcePositions = new Map<string, number>();
	sourceHistory.forEach((commit, depth) => sourcePositions.set(commit.id, sourceHistory.length - 1 - depth));

	const sourceLine = mergeFreeOldestFirst(accessor, sourceHistory);
	const targetLine = mergeFreeOldestFirst(accessor, targetHistory);
	const targetLinePositions = new Map<string, number>();
	targetLine.forEach((commit, index) => targetLinePositions.set(commit.id, index));

	let sourceFingerprints: Map<PatchFingerprint, number[]> | undefined;

	for (const candidate of targetHistory) {
		if (sourcePositions.has(candidate.id)) {
			return matchAt(sourcePositions, candidate, candidate, "identity");
		}
		if (accessor.isMerge(candidate)) {
			continue;
		}

		sourceFingerprints ??= await indexFingerprints(fingerprinter, sourceLine);
		const occurrences = sourceFingerprints.get(await fingerprinter.fingerprint(candidate));
		const targetIndex = targetLinePositions.get(candidate.id);
		if (!occurrences || targetIndex === undefined) {
			continue;
		}

		const lineIndex = await alignedOccurrence(fingerprinter, sourceLine, occurrences, targetLine, targetIndex);
		const matched = sourceLine[lineIndex];
		if (!matched) {
			throw new Error(`Source position ${lineIndex} out of range`);
		}
		return matchAt(sourcePositions, matched, candidate, "fingerprint");
	}

	return ROOT_FORK_POINT;
}

function mergeFreeOldestFirst(accessor: CommitGraphAccessor, newestFirst: Commit[]): Commit[] {
	return newestFirst.filter((commit) => !accessor.isMerge(commit)).reverse();
}

/** Positions of each fingerprint in `commits`, ascending. */
async function indexFingerprints(
	fingerprinter: PatchFingerprinter,
	commits: Commit[],
): Promise<Map<PatchFingerprint, number[]>> {
	const index = new Map<PatchFingerprint, number[]>();
	for (const [i, commit] of commits.entries()) {
		const fp = await fingerprinter.fingerprint(commit);
		const positions = index.get(fp);
		if (positions) {
			positions.push(i);
		} else {
			index.set(fp, [i]);
		}
	}
	return index;
}

async function alignedOccurrence(
	fingerprinter: PatchFingerprinter,
	sourceLine: Commit[],
	occurrences: number[],
	targetLine: Commit[],
	targetIndex: number,
): Promise<number> {
	let best = -1;
	let bestRun = 0;
	for (const position of occurrences) {
		const run = await agreeingRun(fingerprinter, sourceLine, position, targetLine, targetIndex);
		// strictly greater keeps the oldest occurrence on a tie
		if (run > bestRun) {
			best = position;
			bestRun = run;
		}
	}
	return best;
}

/** Number of consecutive commits, walking back from the given positions, that carry the same change. */
async function agreeingRun(
	fingerprinter: PatchFingerprinter,
	sourceLine: Commit[],
	sourceIndex: number,
	targetLine: Commit[],
	targetIndex: number,
): Promise<number> {
	let run = 0;
	for (let s = sourceIndex, t = targetIndex; s >= 0 && t >= 0; s--, t--) {
		const sourceCommit = sourceLine[s];
		const targetCommit = targetLine[t];
		if (!sourceCommit || !targetCommit) {
			break;
		}
		if (
			sourceCommit.id !== targetCommit.id &&
			(await fingerprinter.fingerprint(sourceCommit)) !== (await fingerprinter.fingerprint(targetCommit))
		) {
			break;
		}
		run++;
	}
	return run;
}

function matchAt(
	sourcePositions: Map<string, number>,
	source: Commit,
	target: Commit,
	matchedBy: ForkPoint["matchedBy"],
): ForkPoint {
	const sourceIndex = sourcePositions.get(source.id);
	if (sourceIndex === undefined) {
		throw new Error(`Commit ${source.id} is not on the source history`);
	}
	return { target, source, sourceIndex, matchedBy };
}

export function isRootForkPoint(forkPoint: ForkPoint): boolean {
	return forkPoint.target === null;
}
