import { createHash } from "node:crypto";
import type { Commit, CommitGraphAccessor } from "../git/types.js";
import type { PatchFingerprint } from "./types.js";

// Blob ids depend on the whole pre/post file, not on the change itself.
const INDEX_LINE_REGEX = /^index [0-9a-f]+\.\.[0-9a-f]+( [0-7]{6})?$/;
// Hunk positions shift when the parent gains or loses lines above the change.
const HUNK_HEADER_REGEX = /^@@ -\d+(?:,\d+)? \+\d+(?:,\d+)? @@.*$/;

export function normalizePatch(patch: string): string {
	return patch
		.split("\n")
		.filter((line) => !INDEX_LINE_REGEX.test(line))
		.map((line) => (HUNK_HEADER_REGEX.test(line) ? "@@" : line))
		.join("\n")
		.replace(/\n+$/, "");
}

export function fingerprintPatch(patch: string): PatchFingerprint {
	return createHash("sha256").update(normalizePatch(patch)).digest("hex");
}

/**
 * Content identity of a commit's change. Two commits with the same diff get the
 * same fingerprint whatever their hash, author, date or message.
 */
export class PatchFingerprinter {
	private readonly accessor: CommitGraphAccessor;
	private readonly cache = new Map<string, PatchFingerprint>();

	constructor(accessor: CommitGraphAccessor) {
		this.accessor = accessor;
	}

	async fingerprint(commit: Commit): Promise<PatchFingerprint> {
		if (this.accessor.isMerge(commit)) {
			throw new Error(`Merge commit ${commit.id} has no patch fingerprint`);
		}

		const cached = this.cache.get(commit.id);
		if (cached) {
			return cached;
		}

		const delta = await this.accessor.diff(commit);
		const value = fingerprintPatch(delta.patch);
		this.cache.set(commit.id, value);
		return value;
	}
}
