import * as path from "path";
import { promises as fs } from "fs";
import * as fse from "fs-extra";

import { errorCode } from "./fileutil";
import logger from "./logger";
import { imageMarkerName, packageMarkerName, sleep } from "./utils";

export enum ImageState {
	Absent = "absent",
	Started = "started",
	Downloaded = "downloaded",
	DownloadFailed = "download failed",
	Pushing = "pushing",
	Done = "done",
	Unrecognized = "unrecognized",
}

export enum PackageState {
	Absent = "absent",
	Started = "started",
	Downloaded = "downloaded",
	DownloadFailed = "download failed",
	LoadFailed = "load failed",
	Done = "done",
	Unrecognized = "unrecognized",
}

export class InvalidTransitionError extends Error {
	constructor(machine: string, from: string, to: string) {
		super(`Illegal ${machine} marker transition '${from}' -> '${to}'`);
		this.name = "InvalidTransitionError";
	}
}

/**
 * The token graph of one marker kind. `absent` (no file) and `unrecognized`
 * (a token no state matches) exist only in memory and are never written.
 */
export class StateMachine<S extends string> {
	constructor(
		readonly name: string,
		private readonly states: readonly S[],
		readonly absent: S,
		readonly unrecognized: S,
		private readonly edges: Record<S, readonly S[]>,
	) {}

	parse(token: string | undefined): S {
		if (token === undefined) return this.absent;
		const state = this.states.find((s) => s === token);
		if (state === undefined || state === this.absent || state === this.unrecognized) return this.unrecognized;
		return state;
	}

	canTransition(from: S, to: S): boolean {
		return this.edges[from].includes(to);
	}

	assertTransition(from: S, to: S) {
		if (!this.canTransition(from, to)) throw new InvalidTransitionError(this.name, from, to);
	}
}

export const imageStates = new StateMachine<ImageState>(
	"image",
	Object.values(ImageState),
	ImageState.Absent,
	ImageState.Unrecognized,
	{
		[ImageState.Absent]: [ImageState.Started, ImageState.Downloaded],
		[ImageState.Started]: [ImageState.Downloaded, ImageState.DownloadFailed, ImageState.Done],
		[ImageState.DownloadFailed]: [ImageState.Started, ImageState.Downloaded],
		[ImageState.Downloaded]: [ImageState.Pushing],
		[ImageState.Pushing]: [ImageState.Done, ImageState.Downloaded],
		[ImageState.Done]: [],
		[ImageState.Unrecognized]: [ImageState.Downloaded],
	},
);

export const packageStates = new StateMachine<PackageState>(
	"package",
	Object.values(PackageState),
	PackageState.Absent,
	PackageState.Unrecognized,
	{
		[PackageState.Absent]: [PackageState.Started],
		[PackageState.Started]: [PackageState.Downloaded, PackageState.DownloadFailed, PackageState.LoadFailed],
		[PackageState.DownloadFailed]: [PackageState.Started],
		[PackageState.LoadFailed]: [PackageState.Started],
		[PackageState.Downloaded]: [PackageState.Done],
		[PackageState.Done]: [],
		[PackageState.Unrecognized]: [PackageState.Started],
	},
);

export interface StateStore {
	readonly location: string;
	read(key: string): Promise<string | undefined>;
	write(key: string, token: string): Promise<void>;
	remove(key: string): Promise<void>;
	/**
	 * Reads the token for `key`, lets `decide` pick the token to write (or
	 * `undefined` to leave it) and returns the token that was read. Stores
	 * that support it keep other writers out until the update is applied.
	 */
	update(key: string, decide: (current: string | undefined) => string | undefined): Promise<string | undefined>;
	destroy(): Promise<void>;
}

export type FileStateStoreOptions = {
	lock: boolean;
	lockTimeoutMs?: number;
	lockRetryMs?: number;
	staleLockMs?: number;
};

// a crashed holder's lock must turn stale before waiters give up
const defaultStoreOptions = {
	lockTimeoutMs: 30_000,
	lockRetryMs: 50,
	staleLockMs: 10_000,
};

/**
 * One file per key inside `location`, each holding a single token.
 * Writes go through a temporary file and a rename so readers never see a
 * half-written token. With `lock` set, `update` holds `<key>.lock`
 * (created with O_EXCL) while it reads and writes.
 */
export class FileStateStore implements StateStore {
	private readonly options: Required<FileStateStoreOptions>;

	constructor(
		readonly location: string,
		options: FileStateStoreOptions = { lock: true },
	) {
		this.options = { ...defaultStoreOptions, ...options };
	}

	async init() {
		await fse.ensureDir(this.location);
		return this;
	}

	private file(key: string) {
		return path.join(this.location, key);
	}

	async read(key: string): Promise<string | undefined> {
		try {
			return (await fs.readFile(this.file(key), "utf-8")).trim();
		} catch (e) {
			if (errorCode(e) === "ENOENT") return undefined;
			throw e;
		}
	}

	async write(key: string, token: string): Promise<void> {
		const target = this.file(key);
		const tmp = `${target}.${process.pid}.tmp`;
		await fs.writeFile(tmp, token + "\n");
		await fs.rename(tmp, target);
	}

	async remove(key: string): Promise<void> {
		await fse.remove(this.file(key));
	}

	async update(key: string, decide: (current: string | undefined) => string | undefined) {
		return this.withLock(key, async () => {
			const current = await this.read(key);
			const next = decide(current);
			if (next !== undefined && next !== current) await this.write(key, next);
			return current;
		});
	}

	async destroy(): Promise<void> {
		logger.debug(`Removing state directory ${this.location}`);
		await fse.remove(this.location);
	}

	private async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
		if (!this.options.lock) return fn();
		const lockFile = this.file(key) + ".lock";
		const deadline = Date.now() + this.options.lockTimeoutMs;
		for (;;) {
			try {
				const handle = await fs.open(lockFile, "wx");
				await handle.close();
				break;
			} catch (e) {
				if (errorCode(e) !== "EEXIST") throw e;
				if (await this.isStale(lockFile)) {
					logger.warn(`Removing stale lock ${lockFile}`);
					await fse.remove(lockFile);
					continue;
				}
				if (Date.now() > deadline) throw new Error(`Timed out waiting for lock ${lockFile}`);
				await sleep(this.options.lockRetryMs);
			}
		}
		try {
			return await fn();
		} finally {
			await fse.remove(lockFile);
		}
	}

	private async isStale(lockFile: string) {
		try {
			const { mtimeMs } = await fs.stat(lockFile);
			return Date.now() - mtimeMs > this.options.staleLockMs;
		} catch (e) {
			// released between open and stat
			if (errorCode(e) === "ENOENT") return false;
			throw e;
		}
	}
}

export class Marker<S extends string> {
	constructor(
		private readonly store: StateStore,
		readonly key: string,
		private readonly machine: StateMachine<S>,
	) {}

	async read(): Promise<S> {
		return this.machine.parse(await this.store.read(this.key));
	}

	async advance(from: S, to: S) {
		this.machine.assertTransition(from, to);
		await this.store.write(this.key, to);
	}

	async clear() {
		await this.store.remove(this.key);
	}

	/** Moves `from` -> `to` only if the marker still reads `from`. Returns the state that was read. */
	async claim(from: S, to: S): Promise<S> {
		this.machine.assertTransition(from, to);
		const observed = await this.store.update(this.key, (current) =>
			this.machine.parse(current) === from ? to : undefined,
		);
		return this.machine.parse(observed);
	}

	/** Applies `decide` to the current state under the store's lock. Returns the state that was read. */
	async update(decide: (current: S) => S | undefined): Promise<S> {
		const observed = await this.store.update(this.key, (token) => {
			const current = this.machine.parse(token);
			const next = decide(current);
			if (next === undefined) return undefined;
			this.machine.assertTransition(current, next);
			return next;
		});
		return this.machine.parse(observed);
	}
}

export function imageMarker(store: StateStore, destinationRepoTag: string) {
	return new Marker(store, imageMarkerName(destinationRepoTag), imageStates);
}

export function packageMarker(store: StateStore, archivePath: string) {
	return new Marker(store, packageMarkerName(archivePath), packageStates);
}
