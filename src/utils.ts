import * as path from "path";

export function unique(vals: string[]): string[] {
	return [...new Set(vals)];
}

export function omit<T>(obj: Record<string, T>, keys: string[]): Record<string, T> {
	return Object.fromEntries(Object.entries(obj).filter(([k]) => !keys.includes(k)));
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

// Marker keys must be plain file names: "team/api:1.0" -> "team-api:1.0"
export function imageMarkerName(destinationRepoTag: string): string {
	return destinationRepoTag.split("/").join("-");
}

export function packageMarkerName(archivePath: string): string {
	return path.basename(archivePath) + "-status";
}

// Some podman versions cannot load a file whose path contains ':'
export function stateDirFor(stateRoot: string, destination: string, release: string): string {
	return path.join(stateRoot, destination.replace(/:/g, "-"), release);
}

export function destinationReference(destination: string, repoTag: string): string {
	return `${destination.replace(/\/+$/, "")}/${repoTag}`;
}

export function artifactUrl(baseUrl: string, archivePath: string): string {
	return `${baseUrl.replace(/\/+$/, "")}/${archivePath.replace(/^\/+/, "")}`;
}

/**
 * Extracts the image reference from `docker load` / `podman load` output.
 * Both print lines such as `Loaded image: repo:tag` or `Loaded image(s): repo:tag`;
 * everything up to the first ": " is dropped. The last such line wins.
 */
export function parseLoadedReference(output: string): string | undefined {
	const refs = output
		.split("\n")
		.map((line) => line.trim())
		.filter((line) => line.startsWith("Loaded image"))
		.map((line) => line.replace(/^[^:]*: /, "").trim())
		.filter((ref) => ref.length > 0);
	return refs[refs.length - 1];
}
