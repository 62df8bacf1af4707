export class ExecError extends Error {
	readonly stdout: string;
	readonly stderr: string;
	readonly code: number | undefined;

	constructor(command: string, stdout: string, stderr: string, code: number | undefined) {
		super(`Command failed: ${command}\n${stderr}`);
		this.name = "ExecError";
		this.stdout = stdout;
		this.stderr = stderr;
		this.code = code;
	}
}

export class DirtyWorkingTreeError extends Error {
	readonly kind = "dirty-working-tree";

	constructor(repoPath: string) {
		super(
			`Working tree at ${repoPath} has modified files. Please stash or commit your changes before running this command.`,
		);
		this.name = "DirtyWorkingTreeError";
	}
}

export class UnknownBranchError extends Error {
	readonly kind = "unknown-branch";
	readonly branch: string;

	constructor(branch: string, reason = "does not exist") {
		super(`Branch '${branch}' ${reason}`);
		this.name = "UnknownBranchError";
		this.branch = branch;
	}
}

/** The accessor could not apply a delta on top of the requested parent. */
export class PatchConflictError extends Error {
	readonly parent: string;

	constructor(parent: string, detail: string) {
		super(`Patch does not apply on ${parent}: ${detail}`);
		this.name = "PatchConflictError";
		this.parent = parent;
	}
}

export class ConflictDuringReplayError extends Error {
	readonly kind = "conflict-during-replay";
	readonly commitId: string;
	readonly subject: string;
	readonly branch: string;

	constructor(commitId: string, subject: string, branch: string, cause: PatchConflictError) {
		super(
			`Conflict while replaying ${commitId.slice(0, 8)} "${subject}" onto '${branch}'. Nothing was published; '${branch}' is unchanged.`,
			{ cause },
		);
		this.name = "ConflictDuringReplayError";
		this.commitId = commitId;
		this.subject = subject;
		this.branch = branch;
	}
}

export class RefUpdateRejectedError extends Error {
	readonly branch: string;

	constructor(branch: string, expected: string) {
		super(`Refusing to move '${branch}': it no longer points at ${expected.slice(0, 8)}`);
		this.name = "RefUpdateRejectedError";
		this.branch = branch;
	}
}

/** The checked-out working tree cannot be moved to the new tip; the ref is left where it was. */
export class WorkingTreeUpdateError extends Error {
	readonly kind = "working-tree-update";
	readonly branch: string;

	constructor(branch: string, detail: string) {
		super(`Cannot update the working tree of checked-out branch '${branch}' (${detail}); '${branch}' is unchanged.`);
		this.name = "WorkingTreeUpdateError";
		this.branch = branch;
	}
}

export type ReconcileErrorKind =
	| "dirty-working-tree"
	| "unknown-branch"
	| "conflict-during-replay"
	| "ref-update-rejected"
	| "working-tree-update"
	| "git"
	| "unexpected";

export function classifyReconcileError(err: unknown): ReconcileErrorKind {
	if (err instanceof DirtyWorkingTreeError || err instanceof UnknownBranchError) {
		return err.kind;
	}
	if (err instanceof ConflictDuringReplayError || err instanceof WorkingTreeUpdateError) {
		return err.kind;
	}
	if (err instanceof RefUpdateRejectedError) {
		return "ref-update-rejected";
	}
	if (err instanceof ExecError) {
		return "git";
	}
	return "unexpected";
}
