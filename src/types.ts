export type ImageRecord = {
	index: number;
	sourceReference: string;
	destinationRepoTag: string;
	expectedDigest: string;
	sizeHint: string;
	archivePath?: string;
	requiresExplicitTag: boolean;
	// archive path of the package this image ships in
	package?: string;
};

export type PackageRecord = {
	archivePath: string;
	checksum: string;
	sizeHint: string;
	members: ImageRecord[];
};

export type MirrorManifest = {
	release: string;
	destinationRegistry?: string;
	artifactBaseUrl?: string;
	images: ImageRecord[];
	packages: PackageRecord[];
};

export enum RunMode {
	Combined = "DOWNLOAD_OR_PULL_AND_PUSH",
	AcquireOnly = "DOWNLOAD_OR_PULL_ONLY",
	PushOnly = "DOCKER_PUSH_ONLY",
}

export type EngineName = "docker" | "podman";

export enum InsecureRegistrySupport {
	NO,
	YES,
}

export type Options = {
	destination?: string;
	mode: RunMode;
	manifest: string;
	file?: string;
	stateRoot: string;
	engine?: EngineName;
	insecure?: boolean;
	retries: number;
	pushTimeout: number;
	pollInterval: number;
	lock: boolean;
	verbose?: boolean;
};

export type FailureKind = "transfer" | "load" | "digest-mismatch" | "publish" | "timeout" | "not-acquired" | "state";

export type Outcome =
	| { kind: "success"; stage: "acquired" | "published" }
	| { kind: "already-done" }
	| { kind: "skipped"; reason: string }
	| { kind: "failed"; failure: FailureKind; message: string };

export type RunSummary = {
	total: number;
	completedCount: number;
	errorCount: number;
	exitCode: 0 | 1;
	stateRemoved: boolean;
};
