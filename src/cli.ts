#!/usr/bin/env node

import * as fs from "fs";
import { Command } from "commander";

import { ConfigError, DEFAULT_CONFIG_FILE, readConfigFile, resolveOptions } from "./config";
import { InFlight, MirrorContext } from "./context";
import { detectEngine } from "./engine";
import { HttpDownloader } from "./httpRequest";
import logger from "./logger";
import { loadManifest } from "./manifest";
import { FileStateStore } from "./markers";
import { runMirror } from "./runner";
import { InsecureRegistrySupport, Options } from "./types";
import { sleep, stateDirFor } from "./utils";
import { VERSION } from "./version";

const program = new Command();

program
	.name("image-mirror")
	.description("Copies the container images listed in a manifest into your own registry.")
	.argument("[destination]", "Optional: Destination registry[/path] - default, destinationRegistry from the manifest")
	.argument("[mode]", "Optional: DOWNLOAD_OR_PULL_AND_PUSH (default), DOWNLOAD_OR_PULL_ONLY or DOCKER_PUSH_ONLY")
	.option("--manifest <path>", "Optional: Image manifest (JSON) - default, images.json")
	.option("--file <path>", `Optional: Name of configuration file (defaults to ${DEFAULT_CONFIG_FILE} if found)`)
	.option("--stateRoot <dir>", "Optional: Folder holding the shared progress markers - default, <tmpdir>/image-mirror")
	.option("--engine <docker|podman>", "Optional: Container engine to use - default, docker if found, else podman")
	.option("--insecure", "Optional: Accept self-signed/untrusted certificates from the artifact server")
	.option("--retries <n>", "Optional: Download retries per archive - default, 10")
	.option("--pushTimeout <seconds>", "Optional: How long push-only waits for an image to be downloaded - default, 1800")
	.option("--pollInterval <seconds>", "Optional: How often push-only checks progress markers - default, 10")
	.option("--no-lock", "Optional: Do not hold lock files while updating progress markers")
	.option("--verbose", "Verbose logging")
	.version(VERSION, "--version", "Get image-mirror version");

program.parse(process.argv);

const keys = program.options.map((x) => x.attributeName());
// only values given on the command line may override the config file
const cliOptions = Object.fromEntries(
	Object.entries(program.opts()).filter(([k]) => program.getOptionValueSource(k) === "cli"),
);

function exitWithError(error: string): never {
	logger.error(error);
	return program.help({ error: true });
}

let options: Options;
try {
	const configFile =
		typeof cliOptions.file === "string"
			? cliOptions.file
			: fs.existsSync(DEFAULT_CONFIG_FILE)
				? DEFAULT_CONFIG_FILE
				: undefined;
	const configFromFile = configFile ? readConfigFile(configFile) : {};
	const [destination, mode] = program.args;
	options = resolveOptions(cliOptions, { destination, mode }, configFromFile, keys);
} catch (e) {
	if (e instanceof ConfigError || e instanceof SyntaxError) exitWithError(e.message);
	throw e;
}

if (options.verbose) logger.enableDebug();

async function run(options: Options, inFlight: InFlight) {
	const manifest = await loadManifest(options.manifest);
	const destination = options.destination ?? manifest.destinationRegistry?.replace(/\/+$/, "");
	if (!destination) throw new ConfigError("No destination registry given and the manifest names none");

	const engine = await detectEngine(options.engine);
	logger.info(`Using ${engine.name} to process the images.`);
	logger.info(`Copying ${manifest.images.length} images to ${destination} (${options.mode}).`);

	const workDir = stateDirFor(options.stateRoot, destination, manifest.release);
	const store = await new FileStateStore(workDir, { lock: options.lock }).init();
	logger.debug("Progress markers in " + workDir);

	const ctx: MirrorContext = {
		destination,
		artifactBaseUrl: manifest.artifactBaseUrl,
		workDir,
		total: manifest.images.length,
		engine,
		downloader: new HttpDownloader({
			retries: options.retries,
			allowInsecure: options.insecure ? InsecureRegistrySupport.YES : InsecureRegistrySupport.NO,
		}),
		store,
		inFlight,
		pushTimeoutMs: options.pushTimeout * 1000,
		pollIntervalMs: options.pollInterval * 1000,
		sleep,
	};
	return runMirror(ctx, manifest, options.mode);
}

const inFlight = new InFlight();
let interrupted = false;

function onInterrupt(signal: NodeJS.Signals) {
	if (interrupted) return;
	interrupted = true;
	logger.info("");
	logger.warn(`Received ${signal}, stopping.`);
	inFlight
		.abandon()
		.then((key) => {
			if (key) logger.info(`Reset progress marker ${key} so it can be retried.`);
		})
		.catch((e) => logger.error("Could not reset progress marker:", e))
		.finally(() => process.exit(130));
}

process.on("SIGINT", onInterrupt);
process.on("SIGTERM", onInterrupt);

logger.debug("Running with config:", options);

run(options, inFlight)
	.then((summary) => {
		process.exit(summary.exitCode);
	})
	.catch((error) => {
		logger.error(error instanceof Error ? error.message : error);
		process.exit(1);
	});
