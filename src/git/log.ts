import { exec } from "../utils/exec.js";
import type { Commit } from "./types.js";

// ASCII unit and record separators.
const FIELD_SEP = "\x1f";
const RECORD_SEP = "\x1e";

const LOG_FORMAT = ["%H", "%P", "%an", "%ae", "%aI", "%B"].join("%x1f") + "%x1e";

export function parseLogRecords(stdout: string): Commit[] {
	const commits: Commit[] = [];
	const records = stdout.split(RECORD_SEP).filter((r) => r.trim().length > 0);

	for (const record of records) {
		const fields = record.replace(/^\n/, "").split(FIELD_SEP);
		if (fields.length < 6) {
			continue;
		}

		const [sha, parentStr, name, email, date, ...body] = fields as [string, string, string, string, string, ...string[]];
		commits.push({
			id: sha.trim(),
			parents: parentStr ? parentStr.split(" ").filter(Boolean) : [],
			author: { name, email, date },
			message: body.join(FIELD_SEP).replace(/\n+$/, ""),
		});
	}

	return commits;
}

export async function listFirstParentCommits(repoPath: string, ref: string): Promise<Commit[]> {
	const { stdout } = await exec(`git log --first-parent --format="${LOG_FORMAT}" ${ref} --`, { cwd: repoPath });
	return parseLogRecords(stdout);
}
