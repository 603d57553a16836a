import { MirrorContext } from "../context";
import logger from "../logger";
import { ImageState, PackageState, imageMarker, packageMarker } from "../markers";
import { describeError, downloadArchive, removeArchive } from "../steps";
import { FailureKind, PackageRecord } from "../types";

export type PackageOutcome =
	| { kind: "success" }
	| { kind: "skipped"; state: PackageState }
	| { kind: "failed"; failure: FailureKind; message: string };

function packageFailed(failure: FailureKind, message: string): PackageOutcome {
	logger.error(message);
	return { kind: "failed", failure, message };
}

// A package is left alone while another process holds it or once it has been loaded.
const held = [PackageState.Started, PackageState.Downloaded, PackageState.Done];

/** Downloads a package archive and loads every image in it into the engine. */
export async function acquirePackage(ctx: MirrorContext, pkg: PackageRecord): Promise<PackageOutcome> {
	const marker = packageMarker(ctx.store, pkg.archivePath);
	const observed = await marker.update((current) => (held.includes(current) ? undefined : PackageState.Started));
	if (held.includes(observed)) {
		logger.debug(`Package ${pkg.archivePath} is ${observed}, not downloading.`);
		return { kind: "skipped", state: observed };
	}

	logger.info(`Downloading ${pkg.archivePath} (${pkg.sizeHint || "unknown size"}, ${pkg.members.length} images)`);
	ctx.inFlight.begin(marker.key, () => marker.clear());
	try {
		let file: string;
		try {
			file = await downloadArchive(ctx, pkg.archivePath);
		} catch (e) {
			await ctx.inFlight.settle(() => marker.advance(PackageState.Started, PackageState.DownloadFailed));
			return packageFailed("transfer", describeError(e));
		}
		try {
			await ctx.engine.load(file);
		} catch (e) {
			await ctx.inFlight.settle(() => marker.advance(PackageState.Started, PackageState.LoadFailed));
			return packageFailed("load", `Failed to load ${pkg.archivePath}: ${describeError(e)}`);
		} finally {
			// a corrupt archive must be fetched again, a loaded one is no longer needed
			await removeArchive(file);
		}
		await ctx.inFlight.settle(() => marker.advance(PackageState.Started, PackageState.Downloaded));
		return { kind: "success" };
	} finally {
		ctx.inFlight.end();
	}
}

const memberSettled = [ImageState.Downloaded, ImageState.Pushing, ImageState.Done];

/** Once a package is loaded, moves each member image that has not progressed yet to 'downloaded'. */
export async function markPackageMembers(ctx: MirrorContext, pkg: PackageRecord): Promise<number> {
	const packageState = await packageMarker(ctx.store, pkg.archivePath).read();
	if (packageState != PackageState.Downloaded) return 0;
	let marked = 0;
	for (const member of pkg.members) {
		const observed = await imageMarker(ctx.store, member.destinationRepoTag).update((current) =>
			memberSettled.includes(current) ? undefined : ImageState.Downloaded,
		);
		if (!memberSettled.includes(observed)) marked++;
	}
	logger.debug(`Marked ${marked} images from ${pkg.archivePath} as downloaded`);
	return marked;
}

/** Closes a package once all of its images are pushed. Returns whether the package is done. */
export async function completePackage(ctx: MirrorContext, pkg: PackageRecord): Promise<boolean> {
	const marker = packageMarker(ctx.store, pkg.archivePath);
	for (const member of pkg.members) {
		if ((await imageMarker(ctx.store, member.destinationRepoTag).read()) != ImageState.Done) return false;
	}
	const observed = await marker.update((current) => (current == PackageState.Downloaded ? PackageState.Done : undefined));
	if (observed == PackageState.Downloaded) logger.info(`All images from ${pkg.archivePath} pushed.`);
	return observed == PackageState.Downloaded || observed == PackageState.Done;
}
