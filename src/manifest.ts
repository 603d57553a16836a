import * as fse from "fs-extra";

import logger from "./logger";
import { ImageRecord, MirrorManifest, PackageRecord } from "./types";
import { unique } from "./utils";

export class ManifestError extends Error {
	constructor(
		readonly file: string,
		readonly problems: string[],
	) {
		super(`Invalid manifest ${file}:\n  ${problems.join("\n  ")}`);
		this.name = "ManifestError";
	}
}

type Raw = Record<string, unknown>;

function isRaw(value: unknown): value is Raw {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function optionalString(entry: Raw, key: string, where: string, problems: string[]): string | undefined {
	const value = entry[key];
	if (value === undefined || value === null) return undefined;
	if (typeof value !== "string") {
		problems.push(`${where}: '${key}' must be a string`);
		return undefined;
	}
	return value;
}

function requiredString(entry: Raw, key: string, where: string, problems: string[]): string {
	const value = optionalString(entry, key, where, problems);
	if (!value) {
		const raw = entry[key];
		if (raw === undefined || raw === null || raw === "") problems.push(`${where}: '${key}' is required`);
		return "";
	}
	return value;
}

function parseImage(entry: unknown, position: number, problems: string[]): ImageRecord | undefined {
	const where = `images[${position}]`;
	if (!isRaw(entry)) {
		problems.push(`${where}: must be an object`);
		return undefined;
	}
	const pkg = optionalString(entry, "package", where, problems);
	const index = entry.index ?? position + 1;
	if (typeof index !== "number" || !Number.isInteger(index) || index < 1) {
		problems.push(`${where}: 'index' must be a positive integer`);
	}
	const tag = entry.tag ?? pkg !== undefined;
	if (typeof tag !== "boolean") problems.push(`${where}: 'tag' must be a boolean`);
	else if (tag && pkg === undefined) {
		// standalone images are tagged for the destination when they are acquired
		problems.push(`${where}: 'tag' only applies to images in a package`);
	}
	return {
		index: typeof index === "number" ? index : position + 1,
		sourceReference: requiredString(entry, "source", where, problems),
		destinationRepoTag: requiredString(entry, "destination", where, problems),
		expectedDigest: optionalString(entry, "digest", where, problems) ?? "",
		sizeHint: optionalString(entry, "size", where, problems) ?? "",
		archivePath: optionalString(entry, "archive", where, problems) || undefined,
		requiresExplicitTag: tag === true,
		package: pkg,
	};
}

function parsePackage(entry: unknown, position: number, problems: string[]): PackageRecord | undefined {
	const where = `packages[${position}]`;
	if (!isRaw(entry)) {
		problems.push(`${where}: must be an object`);
		return undefined;
	}
	return {
		archivePath: requiredString(entry, "archive", where, problems),
		checksum: optionalString(entry, "checksum", where, problems) ?? "",
		sizeHint: optionalString(entry, "size", where, problems) ?? "",
		members: [],
	};
}

/** Validates a parsed manifest document. `file` only labels error messages. */
export function parseManifest(doc: unknown, file: string): MirrorManifest {
	const problems: string[] = [];
	if (!isRaw(doc)) throw new ManifestError(file, ["manifest must be a JSON object"]);

	const release = requiredString(doc, "release", "manifest", problems);
	const destinationRegistry = optionalString(doc, "destinationRegistry", "manifest", problems);
	const artifactBaseUrl = optionalString(doc, "artifactBaseUrl", "manifest", problems);
	if (release.includes("/") || release.includes("..")) problems.push("manifest: 'release' must be a plain name");

	const rawImages = doc.images;
	if (!Array.isArray(rawImages) || rawImages.length == 0) {
		throw new ManifestError(file, [...problems, "manifest: 'images' must be a non-empty array"]);
	}
	const rawPackages = doc.packages ?? [];
	if (!Array.isArray(rawPackages)) {
		throw new ManifestError(file, [...problems, "manifest: 'packages' must be an array"]);
	}

	const images = rawImages
		.map((entry, i) => parseImage(entry, i, problems))
		.filter((image): image is ImageRecord => image !== undefined);
	const packages = rawPackages
		.map((entry, i) => parsePackage(entry, i, problems))
		.filter((pkg): pkg is PackageRecord => pkg !== undefined);

	// a repeated destination shares one marker, so later entries find it done
	const destinations = images.map((image) => image.destinationRepoTag);
	unique(destinations)
		.filter((d) => destinations.indexOf(d) !== destinations.lastIndexOf(d))
		.forEach((d) => logger.warn(`${file}: destination '${d}' is listed more than once`));

	const archives = packages.map((pkg) => pkg.archivePath);
	unique(archives)
		.filter((a) => archives.indexOf(a) !== archives.lastIndexOf(a))
		.forEach((a) => problems.push(`package '${a}' is listed more than once`));

	for (const image of images) {
		if (image.package !== undefined) {
			const pkg = packages.find((p) => p.archivePath === image.package);
			if (pkg) pkg.members.push(image);
			else problems.push(`image '${image.destinationRepoTag}' names unknown package '${image.package}'`);
		} else if (image.archivePath && !artifactBaseUrl) {
			problems.push(`image '${image.destinationRepoTag}' has an archive but the manifest has no 'artifactBaseUrl'`);
		}
	}
	if (packages.length > 0 && !artifactBaseUrl) problems.push("packages need an 'artifactBaseUrl'");
	packages
		.filter((pkg) => pkg.members.length == 0)
		.forEach((pkg) => problems.push(`package '${pkg.archivePath}' has no member images`));

	if (problems.length > 0) throw new ManifestError(file, problems);
	return { release, destinationRegistry, artifactBaseUrl, images, packages };
}

export async function loadManifest(file: string): Promise<MirrorManifest> {
	if (!(await fse.pathExists(file))) throw new Error(`Manifest file '${file}' not found`);
	const doc: unknown = await fse.readJson(file);
	return parseManifest(doc, file);
}
