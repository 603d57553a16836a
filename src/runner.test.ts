import * as fse from "fs-extra";

import { foldOutcome, runMirror } from "./runner";
import { DESTINATION, TestRig, createRig, makeImage, makePackage } from "./testing/fakes";
import { ImageRecord, MirrorManifest, RunMode } from "./types";

function manifestOf(images: ImageRecord[], packages: MirrorManifest["packages"] = []): MirrorManifest {
	return { release: "1.0", artifactBaseUrl: "https://artifacts.test/repo", images, packages };
}

function logged(spy: jest.SpyInstance, line: string) {
	return spy.mock.calls.some((call) => call[call.length - 1] === line);
}

describe("foldOutcome", () => {
	const zero = { completedCount: 0, errorCount: 0 };

	test("counts pushes and already done images as completed", () => {
		expect(foldOutcome(zero, { kind: "success", stage: "published" })).toEqual({ completedCount: 1, errorCount: 0 });
		expect(foldOutcome(zero, { kind: "already-done" })).toEqual({ completedCount: 1, errorCount: 0 });
	});

	test("does not count acquisitions or skips", () => {
		expect(foldOutcome(zero, { kind: "success", stage: "acquired" })).toEqual(zero);
		expect(foldOutcome(zero, { kind: "skipped", reason: "busy" })).toEqual(zero);
	});

	test("counts failures as errors", () => {
		expect(foldOutcome(zero, { kind: "failed", failure: "timeout", message: "late" })).toEqual({
			completedCount: 0,
			errorCount: 1,
		});
	});
});

describe("runMirror", () => {
	let rig: TestRig;
	let log: jest.SpyInstance;
	let error: jest.SpyInstance;
	const images = [
		makeImage(1, "api:1.0", { archivePath: "images/api.tar" }),
		makeImage(2, "team/db:2"),
		makeImage(3, "cache:7"),
	];

	beforeEach(async () => {
		rig = await createRig(3);
		rig.engine.loads.set("api.tar", "vendor.test/api:1.0");
		images.forEach((image) => rig.engine.digests.set(image.sourceReference, image.expectedDigest));
		log = jest.spyOn(console, "log").mockImplementation(() => undefined);
		error = jest.spyOn(console, "error").mockImplementation(() => undefined);
	});

	afterEach(async () => {
		jest.restoreAllMocks();
		await fse.remove(rig.dir);
	});

	test("mirrors everything and removes the state directory", async () => {
		const summary = await runMirror(rig.ctx, manifestOf(images), RunMode.Combined);
		expect(summary).toEqual({ total: 3, completedCount: 3, errorCount: 0, exitCode: 0, stateRemoved: true });
		expect(rig.engine.count("push")).toBe(3);
		expect(await fse.pathExists(rig.ctx.workDir)).toBe(false);
		expect(logged(log, `Pushed 3/3 images to ${DESTINATION}.`)).toBe(true);
	});

	test("a digest mismatch fails the run and keeps the other markers", async () => {
		rig.engine.digests.set("vendor.test/team/db:2", "sha256:tampered");
		const summary = await runMirror(rig.ctx, manifestOf(images), RunMode.Combined);
		expect(summary).toEqual({ total: 3, completedCount: 2, errorCount: 1, exitCode: 1, stateRemoved: false });
		expect(await rig.store.read("api:1.0")).toBe("done");
		expect(await rig.store.read("team-db:2")).toBeUndefined();
		expect(await rig.store.read("cache:7")).toBe("done");
		expect(logged(log, `Pushed 2/3 images to ${DESTINATION}.`)).toBe(true);
		expect(logged(error, "Failed to download and push 1 images.")).toBe(true);
	});

	test("a rerun only processes what is left", async () => {
		rig.engine.digests.set("vendor.test/team/db:2", "sha256:tampered");
		await runMirror(rig.ctx, manifestOf(images), RunMode.Combined);
		rig.engine.digests.set("vendor.test/team/db:2", "sha256:digest-2");
		rig.engine.calls.length = 0;

		const summary = await runMirror(rig.ctx, manifestOf(images), RunMode.Combined);
		expect(summary.exitCode).toBe(0);
		expect(summary.stateRemoved).toBe(true);
		expect(rig.engine.count("push")).toBe(1);
		expect(rig.engine.count("pull")).toBe(1);
		expect(rig.downloader.requests).toHaveLength(1);
	});

	test("a destination listed twice is pushed once and counted twice", async () => {
		const twice = [images[1], makeImage(2, "team/db:2"), images[2]];
		const summary = await runMirror(rig.ctx, manifestOf(twice), RunMode.Combined);
		expect(summary).toEqual({ total: 3, completedCount: 3, errorCount: 0, exitCode: 0, stateRemoved: true });
		expect(rig.engine.count("push")).toBe(2);
	});

	test("finished images are not touched again", async () => {
		for (const key of ["api:1.0", "team-db:2", "cache:7"]) await rig.store.write(key, "done");
		const summary = await runMirror(rig.ctx, manifestOf(images), RunMode.Combined);
		expect(summary).toEqual({ total: 3, completedCount: 3, errorCount: 0, exitCode: 0, stateRemoved: true });
		expect(rig.engine.calls).toEqual([]);
		expect(rig.downloader.requests).toEqual([]);
	});

	test("acquire-only hands over to push-only", async () => {
		const acquired = await runMirror(rig.ctx, manifestOf(images), RunMode.AcquireOnly);
		expect(acquired).toEqual({ total: 3, completedCount: 0, errorCount: 0, exitCode: 0, stateRemoved: false });
		expect(await rig.store.read("api:1.0")).toBe("downloaded");
		expect(await rig.store.read("team-db:2")).toBe("downloaded");
		expect(logged(log, "Remaining images are being processed by another process.")).toBe(true);
		expect(rig.engine.count("push")).toBe(0);

		const pushed = await runMirror(rig.ctx, manifestOf(images), RunMode.PushOnly);
		expect(pushed).toEqual({ total: 3, completedCount: 3, errorCount: 0, exitCode: 0, stateRemoved: true });
		expect(rig.engine.count("push")).toBe(3);
		expect(rig.downloader.requests).toHaveLength(1);
	});

	test("push-only reports images that never arrive", async () => {
		const summary = await runMirror(rig.ctx, manifestOf(images), RunMode.PushOnly);
		expect(summary).toEqual({ total: 3, completedCount: 0, errorCount: 3, exitCode: 1, stateRemoved: false });
		expect(logged(error, "Failed to docker push 3 images.")).toBe(true);
	});

	test("package images are loaded once and pushed one by one", async () => {
		const members = [makeImage(2, "rt:1"), makeImage(3, "rt-tools:1")];
		const pkg = makePackage("bundles/rt.tar.gz", members);
		const manifest = manifestOf([makeImage(1, "team/db:2"), ...members], [pkg]);
		rig.engine.digests.set("vendor.test/team/db:2", "sha256:digest-1");

		const summary = await runMirror(rig.ctx, manifest, RunMode.Combined);
		expect(summary).toEqual({ total: 3, completedCount: 3, errorCount: 0, exitCode: 0, stateRemoved: true });
		expect(rig.engine.count("load")).toBe(1);
		expect(rig.engine.calls.filter((c) => c.startsWith("push"))).toEqual([
			`push ${DESTINATION}/team/db:2`,
			`push ${DESTINATION}/rt:1`,
			`push ${DESTINATION}/rt-tools:1`,
		]);
	});

	test("images of a package that failed are not waited for", async () => {
		const members = [makeImage(2, "rt:1"), makeImage(3, "rt-tools:1")];
		const pkg = makePackage("bundles/rt.tar.gz", members);
		const manifest = manifestOf([makeImage(1, "team/db:2"), ...members], [pkg]);
		rig.engine.digests.set("vendor.test/team/db:2", "sha256:digest-1");
		rig.downloader.failing.add("bundles/rt.tar.gz");

		const summary = await runMirror(rig.ctx, manifest, RunMode.Combined);
		expect(summary).toEqual({ total: 3, completedCount: 1, errorCount: 1, exitCode: 1, stateRemoved: false });
		expect(rig.sleeps).toEqual([]);
		expect(await rig.store.read("rt.tar.gz-status")).toBe("download failed");
	});
});
