import { MirrorContext } from "../context";
import logger from "../logger";
import { ImageState, Marker, imageMarker } from "../markers";
import {
	VerifyPolicy,
	alreadyDone,
	describeError,
	downloadArchive,
	failed,
	loadArchive,
	publish,
	removeArchive,
	removeImages,
	skipped,
	verifyDigest,
} from "../steps";
import { ImageRecord, Outcome } from "../types";
import { destinationReference } from "../utils";

// Producer/consumer pair: one process acquires images and leaves them tagged
// for the destination at 'downloaded', another waits for that and pushes.

const retryable = [ImageState.Absent, ImageState.DownloadFailed];

async function beginAcquire(marker: Marker<ImageState>): Promise<Outcome | undefined> {
	const observed = await marker.update((current) => (retryable.includes(current) ? ImageState.Started : undefined));
	if (retryable.includes(observed)) return undefined;
	if (observed == ImageState.Done) return alreadyDone("The image was already processed.");
	return skipped("Being processed by another process, skipping.");
}

/** Verifies and tags a freshly acquired image, then hands it to the pushers. */
async function handOver(
	ctx: MirrorContext,
	image: ImageRecord,
	marker: Marker<ImageState>,
	reference: string,
	policy: VerifyPolicy,
): Promise<Outcome> {
	const target = destinationReference(ctx.destination, image.destinationRepoTag);
	try {
		const rejected = await verifyDigest(ctx, reference, image.expectedDigest, policy);
		if (rejected) {
			await ctx.inFlight.settle(() => marker.advance(ImageState.Started, ImageState.DownloadFailed));
			return rejected;
		}
		if (reference !== target) {
			try {
				await ctx.engine.tag(reference, target);
			} catch (e) {
				await ctx.inFlight.settle(() => marker.advance(ImageState.Started, ImageState.DownloadFailed));
				return failed("load", `Failed to tag ${reference} as ${target}: ${describeError(e)}`);
			}
		}
		await ctx.inFlight.settle(() => marker.advance(ImageState.Started, ImageState.Downloaded));
		return { kind: "success", stage: "acquired" };
	} finally {
		if (reference !== target) await removeImages(ctx, reference);
	}
}

export async function downloadOnly(ctx: MirrorContext, image: ImageRecord): Promise<Outcome> {
	if (!image.archivePath) throw new Error(`${image.destinationRepoTag} has no archive`);
	const marker = imageMarker(ctx.store, image.destinationRepoTag);
	const busy = await beginAcquire(marker);
	if (busy) return busy;

	logger.info(`Downloading ${image.index}/${ctx.total} ${image.archivePath} for ${image.destinationRepoTag}`);
	ctx.inFlight.begin(marker.key, () => marker.clear());
	try {
		let file: string;
		try {
			file = await downloadArchive(ctx, image.archivePath);
		} catch (e) {
			await ctx.inFlight.settle(() => marker.advance(ImageState.Started, ImageState.DownloadFailed));
			return failed("transfer", describeError(e));
		}

		let reference: string;
		try {
			reference = await loadArchive(ctx, file);
		} catch (e) {
			// load and transfer failures share one marker state at image level
			await ctx.inFlight.settle(() => marker.advance(ImageState.Started, ImageState.DownloadFailed));
			return failed("load", `Failed to load ${image.archivePath}: ${describeError(e)}`);
		} finally {
			await removeArchive(file);
		}

		const outcome = await handOver(ctx, image, marker, reference, "strict");
		if (outcome.kind == "success") logger.info(`Downloaded ${image.index}/${ctx.total} ${image.archivePath}`);
		return outcome;
	} finally {
		ctx.inFlight.end();
	}
}

export async function pullOnly(ctx: MirrorContext, image: ImageRecord): Promise<Outcome> {
	const marker = imageMarker(ctx.store, image.destinationRepoTag);
	const busy = await beginAcquire(marker);
	if (busy) return busy;

	logger.info(`Pulling ${image.index}/${ctx.total} ${image.destinationRepoTag}`);
	ctx.inFlight.begin(marker.key, () => marker.clear());
	try {
		try {
			await ctx.engine.pull(image.sourceReference);
		} catch (e) {
			await ctx.inFlight.settle(() => marker.advance(ImageState.Started, ImageState.DownloadFailed));
			logger.debug(describeError(e));
			return failed("transfer", `Failed to ${ctx.engine.name} pull ${image.sourceReference}`);
		}
		const outcome = await handOver(ctx, image, marker, image.sourceReference, "lenient");
		if (outcome.kind == "success") logger.info(`Pulled ${image.index}/${ctx.total} ${image.sourceReference}`);
		return outcome;
	} finally {
		ctx.inFlight.end();
	}
}

const settled = [ImageState.Downloaded, ImageState.Pushing, ImageState.DownloadFailed, ImageState.Done];

async function waitUntilSettled(ctx: MirrorContext, marker: Marker<ImageState>): Promise<ImageState> {
	let state = await marker.read();
	let elapsed = 0;
	while (!settled.includes(state)) {
		if (elapsed > ctx.pushTimeoutMs) break;
		await ctx.sleep(ctx.pollIntervalMs);
		elapsed += ctx.pollIntervalMs;
		state = await marker.read();
	}
	return state;
}

async function pushClaimed(ctx: MirrorContext, image: ImageRecord, marker: Marker<ImageState>): Promise<Outcome> {
	const target = destinationReference(ctx.destination, image.destinationRepoTag);
	logger.info("Pushing ...");
	ctx.inFlight.begin(marker.key, () => marker.advance(ImageState.Pushing, ImageState.Downloaded));
	try {
		try {
			await publish(ctx, image.sourceReference, target, image.requiresExplicitTag);
		} catch (e) {
			await ctx.inFlight.settle(() => marker.advance(ImageState.Pushing, ImageState.Downloaded));
			logger.debug(describeError(e));
			return failed("publish", `Failed to perform ${ctx.engine.name} push ${target}`);
		}
		await ctx.inFlight.settle(() => marker.advance(ImageState.Pushing, ImageState.Done));
	} finally {
		ctx.inFlight.end();
	}
	logger.info(`Pushed ${image.index}/${ctx.total} ${image.destinationRepoTag}`);
	await removeImages(ctx, target);
	if (image.requiresExplicitTag) await removeImages(ctx, image.sourceReference);
	return { kind: "success", stage: "published" };
}

/**
 * Waits (bounded) for an acquirer to settle the image, then claims it by
 * moving 'downloaded' to 'pushing'. Only the process whose claim lands pushes.
 */
export async function pushOnly(ctx: MirrorContext, image: ImageRecord): Promise<Outcome> {
	const marker = imageMarker(ctx.store, image.destinationRepoTag);
	let state = await waitUntilSettled(ctx, marker);
	if (state == ImageState.Downloaded) {
		state = await marker.claim(ImageState.Downloaded, ImageState.Pushing);
		if (state == ImageState.Downloaded) return pushClaimed(ctx, image, marker);
		// the marker moved between the wait and the claim
		if (!settled.includes(state)) {
			return skipped(`${image.destinationRepoTag} changed to '${state}' while claiming it, skipping.`);
		}
	}

	switch (state) {
		case ImageState.Done:
			return alreadyDone("The image was already processed.");
		case ImageState.Pushing:
			return skipped("Pushing in another process, skipping.");
		case ImageState.DownloadFailed:
			return failed("not-acquired", `${image.destinationRepoTag} was not downloaded or pulled successfully.`);
		default:
			return failed(
				"timeout",
				`Timed out after ${Math.round(ctx.pushTimeoutMs / 1000)}s waiting for ${image.destinationRepoTag} to be downloaded.`,
			);
	}
}
