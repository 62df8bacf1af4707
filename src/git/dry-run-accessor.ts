import { subjectOf, type Commit, type CommitDelta, type CommitGraphAccessor, type CommitMetadata } from "./types.js";

export type PlannedWrite =
	| { kind: "commit"; id: string; parent: string; sourceCommit: string; subject: string }
	| { kind: "move-ref"; branch: string; from: string; to: string };

/**
 * Passes reads through to `inner` and records writes instead of performing
 * them. Planned commits get placeholder ids, so conflicts that would only show
 * up while applying a patch are not detected.
 */
export class DryRunAccessor implements CommitGraphAccessor {
	private readonly inner: CommitGraphAccessor;
	private readonly planned: PlannedWrite[] = [];
	private nextId = 1;

	constructor(inner: CommitGraphAccessor) {
		this.inner = inner;
	}

	get plannedWrites(): readonly PlannedWrite[] {
		return this.planned;
	}

	resolveBranch(name: string): Promise<string | null> {
		return this.inner.resolveBranch(name);
	}

	currentBranch(): Promise<string | null> {
		return this.inner.currentBranch();
	}

	listCommits(ref: string): Promise<Commit[]> {
		return this.inner.listCommits(ref);
	}

	diff(commit: Commit): Promise<CommitDelta> {
		return this.inner.diff(commit);
	}

	isMerge(commit: Commit): boolean {
		return this.inner.isMerge(commit);
	}

	async createCommit(parent: string, delta: CommitDelta, metadata: CommitMetadata): Promise<string> {
		const id = `dry-run-${this.nextId++}`;
		this.planned.push({
			kind: "commit",
			id,
			parent,
			sourceCommit: delta.commitId,
			subject: subjectOf(metadata),
		});
		return id;
	}

	async moveRef(branch: string, newTip: string, expectedOldTip: string): Promise<void> {
		this.planned.push({ kind: "move-ref", branch, from: expectedOldTip, to: newTip });
	}

	currentBranchIsClean(): Promise<boolean> {
		return this.inner.currentBranchIsClean();
	}
}

function shortId(id: string): string {
	return id.startsWith("dry-run-") ? id : id.slice(0, 8);
}

/** Renders planned writes as the git commands a real run would correspond to. */
export function formatPlannedWrites(writes: readonly PlannedWrite[]): string[] {
	return writes.map((w) => {
		if (w.kind === "commit") {
			return `git cherry-pick ${shortId(w.sourceCommit)}  # "${w.subject}" as ${w.id} on ${shortId(w.parent)}`;
		}
		return `git update-ref refs/heads/${w.branch} ${shortId(w.to)} ${shortId(w.from)}`;
	});
}
