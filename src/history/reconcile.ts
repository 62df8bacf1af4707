import { LOG_PREFIX } from "../config.js";
import { DirtyWorkingTreeError, UnknownBranchError } from "../errors.js";
import { subjectOf, type CommitGraphAccessor } from "../git/types.js";
import { tryFastForward } from "./fast-forward.js";
import { PatchFingerprinter } from "./fingerprint.js";
import { isRootForkPoint, resolveForkPoint } from "./fork-point.js";
import { replay } from "./replay.js";
import { buildSeries } from "./series.js";
import type { ForkPoint, ReconcileContext, ReconcileResult } from "./types.js";

interface ReconcilePlan {
	/** Branch whose unique commits are carried over. */
	source: string;
	/** Branch the fork point is resolved against. */
	upstream: string;
	/** Branch whose tip the commits land on. */
	onto: string;
	/** Branch rebound to the result. */
	publish: string;
}

/**
 * Brings `target` up to date with the commits unique to `source`, moving
 * `target` itself. Fast-forwards (keeping commit ids) when possible.
 */
export function topbase(ctx: ReconcileContext, source: string, target: string): Promise<ReconcileResult> {
	return reconcile(ctx, { source, upstream: target, onto: target, publish: target });
}

/**
 * Moves the commits unique to `source` (relative to `target`) on top of
 * `onto`, which defaults to `target`, and rebinds `source` to the result.
 */
export function rebase(ctx: ReconcileContext, source: string, target: string, onto?: string): Promise<ReconcileResult> {
	return reconcile(ctx, { source, upstream: target, onto: onto ?? target, publish: source });
}

async function requireBranch(accessor: CommitGraphAccessor, name: string): Promise<string> {
	const sha = await accessor.resolveBranch(name);
	if (!sha) {
		throw new UnknownBranchError(name);
	}
	return sha;
}

function describeForkPoint(forkPoint: ForkPoint): string {
	if (!forkPoint.target) {
		return "repository root";
	}
	const subject = subjectOf(forkPoint.target);
	if (forkPoint.source && forkPoint.source.id !== forkPoint.target.id) {
		return `${forkPoint.target.id.slice(0, 8)} "${subject}" (matches ${forkPoint.source.id.slice(0, 8)} by content)`;
	}
	return `${forkPoint.target.id.slice(0, 8)} "${subject}"`;
}

async function reconcile(ctx: ReconcileContext, plan: ReconcilePlan): Promise<ReconcileResult> {
	const { accessor } = ctx;
	const log = ctx.log ?? ((line: string) => console.error(line));
	const trace = (msg: string) => {
		if (ctx.verbose) {
			log(`${LOG_PREFIX} ${msg}`);
		}
	};

	if ((ctx.requireCleanTree ?? true) && !(await accessor.currentBranchIsClean())) {
		throw new DirtyWorkingTreeError(ctx.repoPath);
	}

	const tips = new Map<string, string>();
	const tipOf = async (name: string): Promise<string> => {
		const known = tips.get(name);
		if (known) {
			return known;
		}
		const sha = await requireBranch(accessor, name);
		tips.set(name, sha);
		return sha;
	};
	const sourceTip = await tipOf(plan.source);
	const upstreamTip = await tipOf(plan.upstream);
	const ontoTip = await tipOf(plan.onto);
	const previousTip = await tipOf(plan.publish);

	const fingerprinter = new PatchFingerprinter(accessor);
	const forkPoint = await resolveForkPoint(accessor, fingerprinter, sourceTip, upstreamTip);
	if (isRootForkPoint(forkPoint)) {
		log(
			`${LOG_PREFIX} warning: no fork point between '${plan.source}' and '${plan.upstream}'; replaying the entire history of '${plan.source}'`,
		);
	}
	trace(`fork point: ${describeForkPoint(forkPoint)}`);

	const series = await buildSeries(accessor, sourceTip, forkPoint.source?.id ?? null);
	trace(`${series.commits.length} commit(s) unique to '${plan.source}'`);
	for (const merge of series.omittedMerges) {
		trace(`skipping merge ${merge.id.slice(0, 8)} "${subjectOf(merge)}"`);
	}

	let newTip = ontoTip;
	let fastForwarded = false;
	let replayed: ReconcileResult["replayed"] = [];

	if (series.commits.length > 0) {
		const ffTip = tryFastForward(series, forkPoint, ontoTip);
		if (ffTip) {
			trace(`fast-forwarding '${plan.onto}' to ${ffTip.slice(0, 8)}`);
			newTip = ffTip;
			fastForwarded = true;
		} else {
			trace(`replaying onto '${plan.onto}' (${ontoTip.slice(0, 8)})`);
			const outcome = await replay(accessor, series, ontoTip, plan.publish, (step, commit) => {
				trace(`  ${step.original.slice(0, 8)} -> ${step.replayed.slice(0, 8)} "${subjectOf(commit)}"`);
			});
			newTip = outcome.newTip;
			replayed = outcome.replayed;
		}
	}

	const noop = newTip === previousTip;
	if (noop) {
		trace(`'${plan.publish}' is already up to date`);
	} else {
		await accessor.moveRef(plan.publish, newTip, previousTip);
		trace(`moved '${plan.publish}' ${previousTip.slice(0, 8)} -> ${newTip.slice(0, 8)}`);
	}

	return {
		branch: plan.publish,
		previousTip,
		newTip,
		forkPoint,
		seriesLength: series.commits.length,
		commitsReplayed: replayed.length,
		replayed,
		fastForwarded,
		noop,
		omittedMerges: series.omittedMerges.map((m) => m.id),
	};
}
