import * as path from "path";

import archive from "./archive";
import { MirrorContext } from "./context";
import { removeFile } from "./fileutil";
import logger from "./logger";
import { FailureKind, Outcome } from "./types";
import { artifactUrl } from "./utils";

export function failed(failure: FailureKind, message: string): Outcome {
	logger.error(message);
	return { kind: "failed", failure, message };
}

export function skipped(reason: string): Outcome {
	logger.info(reason);
	return { kind: "skipped", reason };
}

export function alreadyDone(message: string): Outcome {
	logger.info(message);
	return { kind: "already-done" };
}

export function describeError(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

export function archiveFile(ctx: MirrorContext, archivePath: string) {
	return path.join(ctx.workDir, path.basename(archivePath));
}

/** Downloads an archive from the artifact server into the work dir; a partial file is kept for resume. */
export async function downloadArchive(ctx: MirrorContext, archivePath: string): Promise<string> {
	if (!ctx.artifactBaseUrl) throw new Error(`No artifact server configured for ${archivePath}`);
	const url = artifactUrl(ctx.artifactBaseUrl, archivePath);
	const file = archiveFile(ctx, archivePath);
	try {
		await ctx.downloader.download(url, file);
	} catch (e) {
		throw new Error(`Failed to download ${url}: ${describeError(e)}`);
	}
	return file;
}

/**
 * Loads an archive into the engine and returns the reference it now carries.
 * Falls back to the repo tags recorded inside the archive when the engine
 * output does not name one.
 */
export async function loadArchive(ctx: MirrorContext, file: string): Promise<string> {
	const reported = await ctx.engine.load(file);
	if (reported) return reported;
	let recorded: string[] = [];
	try {
		recorded = await archive.readRepoTags(file);
	} catch (e) {
		logger.debug(`Could not read repo tags from ${file}: ${describeError(e)}`);
	}
	if (recorded.length == 0) throw new Error(`Could not tell which image ${path.basename(file)} contains`);
	return recorded[0];
}

// strict: an image that cannot be inspected fails; lenient: it passes
export type VerifyPolicy = "strict" | "lenient";

export type DigestCheck = { ok: true } | { ok: false; reason: "mismatch" | "unobtainable" };

export function checkDigest(expected: string, actual: string | undefined, policy: VerifyPolicy): DigestCheck {
	if (!actual) return policy == "strict" ? { ok: false, reason: "unobtainable" } : { ok: true };
	if (!expected || expected === actual) return { ok: true };
	return { ok: false, reason: "mismatch" };
}

export async function verifyDigest(
	ctx: MirrorContext,
	reference: string,
	expected: string,
	policy: VerifyPolicy,
): Promise<Outcome | undefined> {
	const actual = await ctx.engine.inspectDigest(reference);
	const check = checkDigest(expected, actual, policy);
	if (check.ok) {
		if (expected && !actual) logger.warn(`Could not inspect ${reference}, skipping digest verification.`);
		return undefined;
	}
	if (check.reason == "unobtainable") {
		return failed("load", `Could not retrieve the image information for ${reference}. The archive might be invalid.`);
	}
	logger.info(`${expected} is different from ${actual}`);
	return failed("digest-mismatch", `Image checksum for ${reference} does not match.`);
}

/** Tags (when asked) and pushes. Throws with the failing command's message. */
export async function publish(ctx: MirrorContext, localReference: string, target: string, performTag: boolean) {
	if (performTag) await ctx.engine.tag(localReference, target);
	await ctx.engine.push(target);
}

/** Best-effort removal of local images; a failure is logged and does not change the image's outcome. */
export async function removeImages(ctx: MirrorContext, ...references: string[]) {
	for (const reference of references) {
		try {
			await ctx.engine.removeImage(reference);
		} catch (e) {
			logger.warn(`Could not remove local image ${reference}: ${describeError(e)}`);
		}
	}
}

export async function removeArchive(file: string) {
	try {
		await removeFile(file);
	} catch (e) {
		logger.warn(`Could not remove ${file}: ${describeError(e)}`);
	}
}
