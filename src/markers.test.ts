import * as os from "os";
import * as path from "path";
import { promises as fs } from "fs";
import * as fse from "fs-extra";

import {
	FileStateStore,
	ImageState,
	InvalidTransitionError,
	PackageState,
	imageMarker,
	imageStates,
	packageMarker,
	packageStates,
} from "./markers";

describe("state machines", () => {
	test("parses written tokens and maps the rest to unrecognized", () => {
		expect(imageStates.parse(undefined)).toBe(ImageState.Absent);
		expect(imageStates.parse("download failed")).toBe(ImageState.DownloadFailed);
		expect(imageStates.parse("pushing")).toBe(ImageState.Pushing);
		expect(imageStates.parse("garbage")).toBe(ImageState.Unrecognized);
		expect(imageStates.parse("absent")).toBe(ImageState.Unrecognized);
		expect(packageStates.parse("load failed")).toBe(PackageState.LoadFailed);
		expect(imageStates.parse("load failed")).toBe(ImageState.Unrecognized);
	});

	test("done is terminal", () => {
		Object.values(ImageState).forEach((s) => expect(imageStates.canTransition(ImageState.Done, s)).toBe(false));
		Object.values(PackageState).forEach((s) => expect(packageStates.canTransition(PackageState.Done, s)).toBe(false));
	});

	test("pushing can only come from downloaded", () => {
		const sources = Object.values(ImageState).filter((s) => imageStates.canTransition(s, ImageState.Pushing));
		expect(sources).toEqual([ImageState.Downloaded]);
	});

	test("rejects illegal transitions", () => {
		expect(() => imageStates.assertTransition(ImageState.Absent, ImageState.Pushing)).toThrow(InvalidTransitionError);
		expect(() => imageStates.assertTransition(ImageState.Absent, ImageState.Pushing)).toThrow(
			"Illegal image marker transition 'absent' -> 'pushing'",
		);
	});
});

describe("FileStateStore", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await fse.mkdtemp(path.join(os.tmpdir(), "markers-test-"));
		jest.spyOn(console, "error").mockImplementation(() => undefined);
	});

	afterEach(async () => {
		jest.restoreAllMocks();
		await fse.remove(dir);
	});

	test("writes one token per file and reads it back trimmed", async () => {
		const store = await new FileStateStore(path.join(dir, "state")).init();
		await store.write("team-api:1.0", "downloaded");
		expect(await fs.readFile(path.join(dir, "state", "team-api:1.0"), "utf-8")).toBe("downloaded\n");
		expect(await store.read("team-api:1.0")).toBe("downloaded");
		expect(await store.read("missing")).toBeUndefined();
		expect(await fs.readdir(path.join(dir, "state"))).toEqual(["team-api:1.0"]);
	});

	test("update leaves the file alone when decide returns nothing", async () => {
		const store = await new FileStateStore(dir).init();
		const observed = await store.update("key", () => undefined);
		expect(observed).toBeUndefined();
		expect(await fse.pathExists(path.join(dir, "key"))).toBe(false);
		expect(await fse.pathExists(path.join(dir, "key.lock"))).toBe(false);
	});

	test("removes a stale lock and proceeds", async () => {
		const store = await new FileStateStore(dir, { lock: true, staleLockMs: 1000 }).init();
		const lock = path.join(dir, "key.lock");
		await fse.outputFile(lock, "");
		await fs.utimes(lock, new Date(0), new Date(0));
		await store.update("key", () => "started");
		expect(await store.read("key")).toBe("started");
		expect(await fse.pathExists(lock)).toBe(false);
	});

	test("a crashed holder's lock turns stale before waiters give up", async () => {
		const store = await new FileStateStore(dir).init();
		const lock = path.join(dir, "key.lock");
		await fse.outputFile(lock, "");
		const fifteenSecondsAgo = new Date(Date.now() - 15_000);
		await fs.utimes(lock, fifteenSecondsAgo, fifteenSecondsAgo);
		expect(await store.update("key", () => "started")).toBeUndefined();
		expect(await store.read("key")).toBe("started");
	});

	test("reads an absent marker as undefined and waits on a held lock", async () => {
		const store = await new FileStateStore(dir, { lock: true, lockRetryMs: 5 }).init();
		const lock = path.join(dir, "key.lock");
		await fse.outputFile(lock, "");
		expect(await store.read("key")).toBeUndefined();
		const pending = store.update("key", () => "started");
		await new Promise((resolve) => setTimeout(resolve, 20));
		await fse.remove(lock);
		await pending;
		expect(await store.read("key")).toBe("started");
	});

	test("gives up on a lock that is held too long", async () => {
		const store = await new FileStateStore(dir, { lock: true, lockTimeoutMs: 20, lockRetryMs: 5 }).init();
		await fse.outputFile(path.join(dir, "key.lock"), "");
		await expect(store.update("key", () => "started")).rejects.toThrow("Timed out waiting for lock");
		expect(await store.read("key")).toBeUndefined();
	});

	test("ignores lock files when locking is off", async () => {
		const store = await new FileStateStore(dir, { lock: false }).init();
		await fse.outputFile(path.join(dir, "key.lock"), "");
		await store.update("key", () => "started");
		expect(await store.read("key")).toBe("started");
	});

	test("destroy removes the directory", async () => {
		const location = path.join(dir, "registry.test-5000", "1.0");
		const store = await new FileStateStore(location).init();
		await store.write("a", "done");
		await store.destroy();
		expect(await fse.pathExists(location)).toBe(false);
	});
});

describe("Marker", () => {
	let dir: string;
	let store: FileStateStore;

	beforeEach(async () => {
		dir = await fse.mkdtemp(path.join(os.tmpdir(), "marker-test-"));
		store = await new FileStateStore(dir, { lock: true, lockRetryMs: 1 }).init();
	});

	afterEach(async () => {
		await fse.remove(dir);
	});

	test("image markers are keyed by the flattened repo tag", async () => {
		const marker = imageMarker(store, "team/api:1.0");
		expect(marker.key).toBe("team-api:1.0");
		await marker.advance(ImageState.Absent, ImageState.Started);
		expect(await store.read("team-api:1.0")).toBe("started");
	});

	test("package markers are keyed by the archive file name", async () => {
		const marker = packageMarker(store, "bundles/runtimes-1.0.tar.gz");
		expect(marker.key).toBe("runtimes-1.0.tar.gz-status");
		expect(await marker.read()).toBe(PackageState.Absent);
	});

	test("advance refuses an illegal move without writing", async () => {
		const marker = imageMarker(store, "api:1.0");
		await expect(marker.advance(ImageState.Done, ImageState.Started)).rejects.toThrow(InvalidTransitionError);
		expect(await marker.read()).toBe(ImageState.Absent);
	});

	test("claim only moves a marker that still reads the expected state", async () => {
		const marker = imageMarker(store, "api:1.0");
		await store.write(marker.key, "downloaded");
		expect(await marker.claim(ImageState.Downloaded, ImageState.Pushing)).toBe(ImageState.Downloaded);
		expect(await marker.claim(ImageState.Downloaded, ImageState.Pushing)).toBe(ImageState.Pushing);
		expect(await marker.read()).toBe(ImageState.Pushing);
	});

	test("concurrent claims let exactly one through", async () => {
		const first = imageMarker(store, "api:1.0");
		const second = imageMarker(store, "api:1.0");
		await store.write(first.key, "downloaded");
		const observed = await Promise.all([
			first.claim(ImageState.Downloaded, ImageState.Pushing),
			second.claim(ImageState.Downloaded, ImageState.Pushing),
		]);
		expect([...observed].sort()).toEqual([ImageState.Downloaded, ImageState.Pushing]);
	});

	test("update validates the decided transition", async () => {
		const marker = imageMarker(store, "api:1.0");
		await store.write(marker.key, "done");
		await expect(marker.update(() => ImageState.Started)).rejects.toThrow(InvalidTransitionError);
		expect(await marker.read()).toBe(ImageState.Done);
	});

	test("clear deletes the marker", async () => {
		const marker = imageMarker(store, "api:1.0");
		await marker.advance(ImageState.Absent, ImageState.Started);
		await marker.clear();
		expect(await marker.read()).toBe(ImageState.Absent);
	});
});
