import { describe, expect, it } from "vitest";
import { DryRunAccessor, formatPlannedWrites } from "../../src/git/dry-run-accessor.js";
import { MemoryRepo } from "../support/memory-repo.js";

describe("git/dry-run-accessor.ts", () => {
	it("passes reads through to the wrapped accessor", async () => {
		const repo = new MemoryRepo();
		const sha = repo.commit("master", { "a.txt": "a" }, "a");
		const dryRun = new DryRunAccessor(repo);

		expect(await dryRun.resolveBranch("master")).toBe(sha);
		expect(await dryRun.currentBranch()).toBe("master");
		expect((await dryRun.listCommits("master")).map((c) => c.id)).toEqual([sha]);
		expect(await dryRun.currentBranchIsClean()).toBe(true);
	});

	it("records commits and ref moves instead of writing them", async () => {
		const repo = new MemoryRepo();
		const sha = repo.commit("master", { "a.txt": "a" }, "a");
		const dryRun = new DryRunAccessor(repo);
		const delta = await dryRun.diff(repo.getCommit(sha));

		const id = await dryRun.createCommit(sha, delta, { author: repo.getCommit(sha).author, message: "a\n\nbody" });
		await dryRun.moveRef("master", id, sha);

		expect(id).toBe("dry-run-1");
		expect(repo.tip("master")).toBe(sha);
		expect(dryRun.plannedWrites).toEqual([
			{ kind: "commit", id: "dry-run-1", parent: sha, sourceCommit: sha, subject: "a" },
			{ kind: "move-ref", branch: "master", from: sha, to: "dry-run-1" },
		]);
	});

	it("formats planned writes as git commands", () => {
		const lines = formatPlannedWrites([
			{ kind: "commit", id: "dry-run-1", parent: "1234567890abcdef", sourceCommit: "fedcba0987654321", subject: "add a" },
			{ kind: "move-ref", branch: "main", from: "1234567890abcdef", to: "dry-run-1" },
		]);

		expect(lines).toEqual([
			'git cherry-pick fedcba09  # "add a" as dry-run-1 on 12345678',
			"git update-ref refs/heads/main dry-run-1 12345678",
		]);
	});
});
