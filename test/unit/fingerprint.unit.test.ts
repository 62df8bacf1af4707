import { beforeEach, describe, expect, it, vi } from "vitest";
import { fingerprintPatch, normalizePatch, PatchFingerprinter } from "../../src/history/fingerprint.js";
import { MemoryRepo } from "../support/memory-repo.js";

const PATCH_BODY = [
	"diff --git a/lib/a.txt b/lib/a.txt",
	"--- a/lib/a.txt",
	"+++ b/lib/a.txt",
	"@@ -1 +1 @@",
	"-one",
	"+two",
].join("\n");

function withIndex(index: string): string {
	const [header, ...rest] = PATCH_BODY.split("\n");
	return [header, index, ...rest].join("\n");
}

describe("history/fingerprint.ts", () => {
	describe("normalizePatch", () => {
		it("drops blob index lines and hunk positions", () => {
			expect(normalizePatch(withIndex("index 1111111..2222222 100644"))).toBe(
				["diff --git a/lib/a.txt b/lib/a.txt", "--- a/lib/a.txt", "+++ b/lib/a.txt", "@@", "-one", "+two"].join("\n"),
			);
		});

		it("drops the section heading after a hunk header", () => {
			expect(normalizePatch("@@ -12,7 +13,7 @@ function main() {\n-a\n+b")).toBe("@@\n-a\n+b");
		});

		it("keeps mode change lines", () => {
			const patch = "diff --git a/run.sh b/run.sh\nold mode 100644\nnew mode 100755\n";
			expect(normalizePatch(patch)).toBe("diff --git a/run.sh b/run.sh\nold mode 100644\nnew mode 100755");
		});

		it("does not drop content lines that start with 'index'", () => {
			const patch = "+index 1..2\n";
			expect(normalizePatch(patch)).toBe("+index 1..2");
		});
	});

	describe("fingerprintPatch", () => {
		it("is a sha256 hex digest", () => {
			expect(fingerprintPatch(PATCH_BODY)).toMatch(/^[0-9a-f]{64}$/);
		});

		it("ignores differing blob ids for the same change", () => {
			const a = fingerprintPatch(withIndex("index aaaaaaa..bbbbbbb 100644"));
			const b = fingerprintPatch(withIndex("index ccccccc..ddddddd 100644"));
			expect(a).toBe(b);
		});

		it("ignores hunk line numbers when the same change sits lower in the file", () => {
			const shifted = PATCH_BODY.replace("@@ -1 +1 @@", "@@ -2 +2 @@");
			expect(fingerprintPatch(shifted)).toBe(fingerprintPatch(PATCH_BODY));
		});

		it("differs when a single content line differs", () => {
			expect(fingerprintPatch(PATCH_BODY)).not.toBe(fingerprintPatch(PATCH_BODY.replace("+two", "+three")));
		});

		it("differs when only the path differs", () => {
			expect(fingerprintPatch(PATCH_BODY)).not.toBe(fingerprintPatch(PATCH_BODY.replaceAll("lib/a.txt", "lib/b.txt")));
		});

		it("differs when only the file mode changes", () => {
			const modeOnly = "diff --git a/run.sh b/run.sh\nold mode 100644\nnew mode 100755";
			const modeBack = "diff --git a/run.sh b/run.sh\nold mode 100755\nnew mode 100644";
			expect(fingerprintPatch(modeOnly)).not.toBe(fingerprintPatch(modeBack));
		});
	});

	describe("PatchFingerprinter", () => {
		let repo: MemoryRepo;

		beforeEach(() => {
			repo = new MemoryRepo();
			repo.commit("master", { "README.md": "hello" }, "initial");
			repo.createBranch("left", "master");
			repo.createBranch("right", "master");
		});

		it("gives equal fingerprints for the same change with different message, author and hash", async () => {
			const left = repo.commit("left", { "src/app.ts": "export {}" }, "add app");
			const right = repo.commit(
				"right",
				{ "src/app.ts": "export {}" },
				"completely different message",
				{ name: "Someone Else", email: "else@test.com" },
			);
			expect(left).not.toBe(right);

			const fp = new PatchFingerprinter(repo);
			expect(await fp.fingerprint(repo.getCommit(left))).toBe(await fp.fingerprint(repo.getCommit(right)));
		});

		it("gives different fingerprints when content differs", async () => {
			const left = repo.commit("left", { "src/app.ts": "export {}" }, "add app");
			const right = repo.commit("right", { "src/app.ts": "export const x = 1;" }, "add app");

			const fp = new PatchFingerprinter(repo);
			expect(await fp.fingerprint(repo.getCommit(left))).not.toBe(await fp.fingerprint(repo.getCommit(right)));
		});

		it("fingerprints a root commit against the empty tree", async () => {
			const root = repo.historyIds("master")[0]!;
			const fp = new PatchFingerprinter(repo);
			expect(await fp.fingerprint(repo.getCommit(root))).toBe(
				fingerprintPatch(
					"diff --git a/README.md b/README.md\nnew file mode 100644\n--- /dev/null\n+++ b/README.md\n@@ -0,0 +1 @@\n+hello",
				),
			);
		});

		it("refuses to fingerprint a merge commit", async () => {
			repo.commit("right", { "b.txt": "b" }, "b");
			const merge = repo.merge("left", "right", "Merge right into left");

			const fp = new PatchFingerprinter(repo);
			await expect(fp.fingerprint(repo.getCommit(merge))).rejects.toThrow(/Merge commit .* has no patch fingerprint/);
		});

		it("reads each commit's diff only once", async () => {
			const sha = repo.commit("left", { "a.txt": "a" }, "a");
			const diffSpy = vi.spyOn(repo, "diff");

			const fp = new PatchFingerprinter(repo);
			const first = await fp.fingerprint(repo.getCommit(sha));
			const second = await fp.fingerprint(repo.getCommit(sha));

			expect(first).toBe(second);
			expect(diffSpy).toHaveBeenCalledTimes(1);
		});
	});
});
