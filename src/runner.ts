import { MirrorContext } from "./context";
import { downloadAndPush, pullAndPush } from "./handlers/combined";
import { PackageOutcome, acquirePackage, completePackage, markPackageMembers } from "./handlers/packages";
import { downloadOnly, pullOnly, pushOnly } from "./handlers/split";
import logger from "./logger";
import { describeError, skipped } from "./steps";
import { ImageRecord, MirrorManifest, Outcome, RunMode, RunSummary } from "./types";

type ImageHandler = (ctx: MirrorContext, image: ImageRecord) => Promise<Outcome>;

export type Counters = {
	completedCount: number;
	errorCount: number;
};

export function foldOutcome(counters: Counters, outcome: Outcome): Counters {
	switch (outcome.kind) {
		case "success":
			return outcome.stage == "published" ? { ...counters, completedCount: counters.completedCount + 1 } : counters;
		case "already-done":
			return { ...counters, completedCount: counters.completedCount + 1 };
		case "skipped":
			return counters;
		case "failed":
			return { ...counters, errorCount: counters.errorCount + 1 };
	}
}

function foldPackageOutcome(counters: Counters, outcome: PackageOutcome): Counters {
	return outcome.kind == "failed" ? { ...counters, errorCount: counters.errorCount + 1 } : counters;
}

function standaloneHandler(mode: RunMode, image: ImageRecord): ImageHandler {
	switch (mode) {
		case RunMode.Combined:
			return image.archivePath ? downloadAndPush : pullAndPush;
		case RunMode.AcquireOnly:
			return image.archivePath ? downloadOnly : pullOnly;
		case RunMode.PushOnly:
			return pushOnly;
	}
}

async function runImage(ctx: MirrorContext, handler: ImageHandler, image: ImageRecord): Promise<Outcome> {
	logger.info("");
	logger.info(`Processing ${image.index}/${ctx.total} ${image.destinationRepoTag}`);
	try {
		return await handler(ctx, image);
	} catch (e) {
		// marker store trouble; keep going with the rest of the manifest
		const message = `Could not process ${image.destinationRepoTag}: ${describeError(e)}`;
		logger.error(message);
		return { kind: "failed", failure: "state", message };
	}
}

async function runPackageStep(pkgName: string, step: () => Promise<PackageOutcome>): Promise<PackageOutcome> {
	try {
		return await step();
	} catch (e) {
		const message = `Could not process package ${pkgName}: ${describeError(e)}`;
		logger.error(message);
		return { kind: "failed", failure: "state", message };
	}
}

const remediation: Record<RunMode, (errors: number, engine: string) => [string, string]> = {
	[RunMode.Combined]: (errors) => [
		`Failed to download and push ${errors} images.`,
		"Try running again. Images that were processed successfully are skipped.",
	],
	[RunMode.AcquireOnly]: (errors) => [
		`Failed to download or pull ${errors} images.`,
		"Try running again. Images that were downloaded or pulled successfully are skipped.",
	],
	[RunMode.PushOnly]: (errors, engine) => [
		`Failed to ${engine} push ${errors} images.`,
		"Try running again. Images that were pushed successfully are skipped.",
	],
};

/** Walks the manifest once in the given mode and returns the per-process result. */
export async function runMirror(ctx: MirrorContext, manifest: MirrorManifest, mode: RunMode): Promise<RunSummary> {
	let counters: Counters = { completedCount: 0, errorCount: 0 };

	for (const image of manifest.images.filter((i) => i.package === undefined)) {
		counters = foldOutcome(counters, await runImage(ctx, standaloneHandler(mode, image), image));
	}

	// packages this process failed to acquire; their images are not waited for
	const unavailable = new Set<string>();
	if (mode != RunMode.PushOnly) {
		for (const pkg of manifest.packages) {
			const outcome = await runPackageStep(pkg.archivePath, () => acquirePackage(ctx, pkg));
			if (outcome.kind == "failed") unavailable.add(pkg.archivePath);
			counters = foldPackageOutcome(counters, outcome);
			const marking = await runPackageStep(pkg.archivePath, async () => {
				await markPackageMembers(ctx, pkg);
				return { kind: "success" };
			});
			counters = foldPackageOutcome(counters, marking);
		}
	}

	if (mode != RunMode.AcquireOnly) {
		const members = manifest.packages.flatMap((pkg) => pkg.members).sort((a, b) => a.index - b.index);
		for (const member of members) {
			const outcome =
				member.package !== undefined && unavailable.has(member.package)
					? skipped(`${member.destinationRepoTag} is in ${member.package}, which could not be acquired, skipping.`)
					: await runImage(ctx, pushOnly, member);
			counters = foldOutcome(counters, outcome);
		}
		for (const pkg of manifest.packages) {
			const closing = await runPackageStep(pkg.archivePath, async () => {
				await completePackage(ctx, pkg);
				return { kind: "success" };
			});
			counters = foldPackageOutcome(counters, closing);
		}
	}

	return summarize(ctx, mode, counters);
}

async function summarize(ctx: MirrorContext, mode: RunMode, counters: Counters): Promise<RunSummary> {
	const { completedCount, errorCount } = counters;
	const summary = { total: ctx.total, completedCount, errorCount };
	logger.info("");
	if (mode != RunMode.AcquireOnly) {
		logger.info(`Pushed ${completedCount}/${ctx.total} images to ${ctx.destination}.`);
	}
	if (completedCount == ctx.total) {
		await ctx.store.destroy();
		return { ...summary, exitCode: 0, stateRemoved: true };
	}
	if (errorCount == 0) {
		logger.info("Remaining images are being processed by another process.");
		return { ...summary, exitCode: 0, stateRemoved: false };
	}
	const [failure, advice] = remediation[mode](errorCount, ctx.engine.name);
	logger.error(failure);
	logger.warn(advice);
	return { ...summary, exitCode: 1, stateRemoved: false };
}
