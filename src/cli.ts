#!/usr/bin/env node
import { Command } from "commander";
import { defaultConfig, DRY_RUN_LOG_PREFIX, LOG_PREFIX, type ReconcileConfig } from "./config.js";
import { classifyReconcileError, UnknownBranchError } from "./errors.js";
import { GitAccessor } from "./git/accessor.js";
import { DryRunAccessor, formatPlannedWrites } from "./git/dry-run-accessor.js";
import { isGitAvailable } from "./git/status.js";
import { rebase, topbase } from "./history/reconcile.js";
import type { ReconcileContext, ReconcileResult } from "./history/types.js";

interface CommonOpts {
	repo: string;
	dryRun?: boolean;
	verbose?: boolean;
	allowDirty?: boolean;
}

function configFrom(opts: CommonOpts): ReconcileConfig {
	return defaultConfig({
		repoPath: opts.repo,
		dryRun: opts.dryRun,
		verbose: opts.verbose,
		requireCleanTree: !opts.allowDirty,
	});
}

function formatResult(result: ReconcileResult): string {
	const short = (sha: string) => (sha.startsWith("dry-run-") ? sha : sha.slice(0, 8));
	if (result.noop) {
		return `'${result.branch}' is up to date (${short(result.newTip)})`;
	}
	const how = result.fastForwarded
		? `fast-forwarded ${result.seriesLength} commit(s)`
		: `replayed ${result.commitsReplayed} commit(s)`;
	const skipped = result.omittedMerges.length > 0 ? `, skipped ${result.omittedMerges.length} merge(s)` : "";
	return `'${result.branch}' ${short(result.previousTip)} -> ${short(result.newTip)}: ${how}${skipped}`;
}

async function run(
	config: ReconcileConfig,
	operation: (ctx: ReconcileContext) => Promise<ReconcileResult>,
): Promise<void> {
	if (!(await isGitAvailable())) {
		console.error(`${LOG_PREFIX} Failed to run. Missing dependency 'git'`);
		process.exit(1);
		return;
	}

	const git = new GitAccessor(config.repoPath);
	const dryRun = config.dryRun ? new DryRunAccessor(git) : null;
	const ctx: ReconcileContext = {
		accessor: dryRun ?? git,
		repoPath: config.repoPath,
		verbose: config.verbose,
		requireCleanTree: config.requireCleanTree,
		log: config.dryRun ? (line) => console.log(`${DRY_RUN_LOG_PREFIX}${line}`) : undefined,
	};

	try {
		const result = await operation(ctx);
		if (dryRun) {
			for (const line of formatPlannedWrites(dryRun.plannedWrites)) {
				console.log(line);
			}
		}
		console.error(`${LOG_PREFIX} ${formatResult(result)}`);
		process.exit(0);
		return;
	} catch (err) {
		const kind = classifyReconcileError(err);
		const message = err instanceof Error ? err.message : String(err);
		console.error(`${LOG_PREFIX} ${kind}: ${message}`);
		process.exit(1);
		return;
	}
}

function withCommonOptions(command: Command): Command {
	return command
		.option("--repo <path>", "Path to the git repository", process.cwd())
		.option("--dry-run", "Print the planned git commands without writing anything")
		.option("--verbose", "Trace each reconciliation step")
		.option("--allow-dirty", "Skip the clean working tree check");
}

const program = new Command();

program
	.name("split-reconcile")
	.description("Reattach a split-out or split-in branch onto a comparison branch");

withCommonOptions(
	program
		.command("topbase")
		.description("Add the commits unique to <source> on top of <target>, fast-forwarding when possible")
		.argument("<source>", "Branch carrying the new commits")
		.argument("[target]", "Branch to update (defaults to the current branch)"),
).action(async (source: string, target: string | undefined, opts: CommonOpts) => {
	await run(configFrom(opts), async (ctx) => {
		const targetBranch = target ?? (await ctx.accessor.currentBranch());
		if (!targetBranch) {
			throw new UnknownBranchError("HEAD", "is detached; name the target branch explicitly");
		}
		return topbase(ctx, source, targetBranch);
	});
});

withCommonOptions(
	program
		.command("rebase")
		.description("Move the commits unique to <source> onto <target> (or --onto) and update <source>")
		.argument("<source>", "Branch to rebase")
		.argument("<target>", "Upstream branch the fork point is resolved against")
		.option("--onto <branch>", "Branch to place the commits on instead of <target>"),
).action(async (source: string, target: string, opts: CommonOpts & { onto?: string }) => {
	await run(configFrom(opts), (ctx) => rebase(ctx, source, target, opts.onto));
});

await program.parseAsync();
