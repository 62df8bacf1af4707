import { resolve } from "node:path";

export interface ReconcileConfig {
	repoPath: string;
	dryRun: boolean;
	verbose: boolean;
	requireCleanTree: boolean;
}

export const LOG_PREFIX = "[split-reconcile]";

/** Prefix for trace lines interleaved with dry-run command output. */
export const DRY_RUN_LOG_PREFIX = "   # ";

export function defaultConfig(overrides: Partial<ReconcileConfig> = {}): ReconcileConfig {
	return {
		repoPath: resolve(overrides.repoPath ?? process.cwd()),
		dryRun: overrides.dryRun ?? false,
		verbose: overrides.verbose ?? false,
		requireCleanTree: overrides.requireCleanTree ?? true,
	};
}
