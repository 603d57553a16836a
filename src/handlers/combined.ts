import { MirrorContext } from "../context";
import logger from "../logger";
import { ImageState, Marker, imageMarker } from "../markers";
import {
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

// Single-process pipeline: acquire, verify and push in one go. The marker
// stays at 'started' until the push lands, and any failure deletes it so the
// next run starts over.

function skipUnlessAbsent(observed: ImageState): Outcome {
	if (observed == ImageState.Done) return alreadyDone("Already processed.");
	return skipped("Being processed by another process, skipping.");
}

async function pushAndFinish(
	ctx: MirrorContext,
	image: ImageRecord,
	localReference: string,
	marker: Marker<ImageState>,
): Promise<Outcome> {
	const target = destinationReference(ctx.destination, image.destinationRepoTag);
	const performTag = localReference !== target;
	try {
		try {
			await publish(ctx, localReference, target, performTag);
		} catch (e) {
			await ctx.inFlight.settle(() => marker.clear());
			logger.debug(describeError(e));
			return failed("publish", `Failed to perform ${ctx.engine.name} push ${target}`);
		}
		await ctx.inFlight.settle(() => marker.advance(ImageState.Started, ImageState.Done));
	} finally {
		if (performTag) await removeImages(ctx, target);
	}
	logger.info(`Pushed ${image.index}/${ctx.total} ${image.destinationRepoTag}`);
	return { kind: "success", stage: "published" };
}

/** Archive variant: download from the artifact server, load, verify strictly, push. */
export async function downloadAndPush(ctx: MirrorContext, image: ImageRecord): Promise<Outcome> {
	if (!image.archivePath) throw new Error(`${image.destinationRepoTag} has no archive`);
	const marker = imageMarker(ctx.store, image.destinationRepoTag);
	const observed = await marker.claim(ImageState.Absent, ImageState.Started);
	if (observed != ImageState.Absent) return skipUnlessAbsent(observed);

	ctx.inFlight.begin(marker.key, () => marker.clear());
	try {
		let file: string;
		try {
			file = await downloadArchive(ctx, image.archivePath);
		} catch (e) {
			await ctx.inFlight.settle(() => marker.clear());
			return failed("transfer", describeError(e));
		}

		let reference: string;
		try {
			reference = await loadArchive(ctx, file);
		} catch (e) {
			await ctx.inFlight.settle(() => marker.clear());
			return failed("load", `Failed to load ${image.archivePath}: ${describeError(e)}`);
		} finally {
			await removeArchive(file);
		}

		try {
			const rejected = await verifyDigest(ctx, reference, image.expectedDigest, "strict");
			if (rejected) {
				await ctx.inFlight.settle(() => marker.clear());
				return rejected;
			}
			return await pushAndFinish(ctx, image, reference, marker);
		} finally {
			await removeImages(ctx, reference);
		}
	} finally {
		ctx.inFlight.end();
	}
}

/** Registry variant: pull the source reference, verify leniently, push. */
export async function pullAndPush(ctx: MirrorContext, image: ImageRecord): Promise<Outcome> {
	const marker = imageMarker(ctx.store, image.destinationRepoTag);
	const observed = await marker.claim(ImageState.Absent, ImageState.Started);
	if (observed != ImageState.Absent) return skipUnlessAbsent(observed);

	ctx.inFlight.begin(marker.key, () => marker.clear());
	try {
		try {
			await ctx.engine.pull(image.sourceReference);
		} catch (e) {
			await ctx.inFlight.settle(() => marker.clear());
			logger.debug(describeError(e));
			return failed("transfer", `Failed to ${ctx.engine.name} pull ${image.sourceReference}`);
		}

		try {
			const rejected = await verifyDigest(ctx, image.sourceReference, image.expectedDigest, "lenient");
			if (rejected) {
				await ctx.inFlight.settle(() => marker.clear());
				return rejected;
			}
			return await pushAndFinish(ctx, image, image.sourceReference, marker);
		} finally {
			await removeImages(ctx, image.sourceReference);
		}
	} finally {
		ctx.inFlight.end();
	}
}
