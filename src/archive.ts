import * as tar from "tar";

import logger from "./logger";

type SavedImage = {
	Config?: string;
	RepoTags?: string[] | null;
	Layers?: string[];
};

function isSavedImageList(value: unknown): value is SavedImage[] {
	return Array.isArray(value) && value.every((entry) => entry !== null && typeof entry === "object");
}

/**
 * Reads the `manifest.json` a `docker save` / `podman save` archive carries
 * and returns the repo tags recorded there, in order.
 */
async function readRepoTags(archive: string): Promise<string[]> {
	const chunks: Buffer[] = [];
	await tar.t({
		file: archive,
		filter: (entryPath) => entryPath.replace(/^\.\//, "") === "manifest.json",
		onentry: (entry) => {
			entry.on("data", (chunk: Buffer) => chunks.push(chunk));
		},
	});
	if (chunks.length == 0) {
		logger.debug(`No manifest.json in ${archive}`);
		return [];
	}
	const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString("utf-8"));
	if (!isSavedImageList(parsed)) throw new Error(`Unexpected manifest.json layout in ${archive}`);
	return parsed.flatMap((image) => image.RepoTags ?? []);
}

export default {
	readRepoTags,
};
