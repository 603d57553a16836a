import * as os from "os";
import * as path from "path";
import * as fs from "fs";

import { EngineName, Options, RunMode } from "./types";
import { omit } from "./utils";

export const DEFAULT_CONFIG_FILE = "image-mirror.json";

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export const defaultOptions = {
	mode: RunMode.Combined,
	manifest: "images.json",
	stateRoot: path.join(os.tmpdir(), "image-mirror"),
	retries: 10,
	pushTimeout: 1800,
	pollInterval: 10,
	lock: true,
};

const modeAliases: Record<string, RunMode> = {
	combined: RunMode.Combined,
	"acquire-only": RunMode.AcquireOnly,
	"push-only": RunMode.PushOnly,
};

export function parseMode(value: string): RunMode {
	const mode = Object.values(RunMode).find((m) => m.toLowerCase() == value.toLowerCase());
	const alias = modeAliases[value.toLowerCase()];
	if (mode) return mode;
	if (alias) return alias;
	throw new ConfigError(`Unknown mode '${value}'. Use one of ${Object.values(RunMode).join(", ")}`);
}

function parseEngine(value: unknown): EngineName | undefined {
	if (value === undefined) return undefined;
	if (value === "docker" || value === "podman") return value;
	throw new ConfigError(`--engine must be docker or podman but was: ${value}`);
}

function toNumber(value: unknown, name: string, min: number): number {
	const n = typeof value === "number" ? value : Number(value);
	if (typeof value === "boolean" || !Number.isFinite(n) || n < min) {
		throw new ConfigError(`--${name} must be a number >= ${min} but was: ${value}`);
	}
	return n;
}

function toOptionalString(value: unknown, name: string): string | undefined {
	if (value === undefined) return undefined;
	if (typeof value !== "string") throw new ConfigError(`--${name} must be a string`);
	return value;
}

export function readConfigFile(file: string): Record<string, unknown> {
	if (!fs.existsSync(file)) throw new ConfigError(`Config file '${file}' not found`);
	const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
	if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
		throw new ConfigError(`Config file '${file}' must hold a JSON object`);
	}
	return Object.fromEntries(Object.entries(parsed));
}

/**
 * Merges defaults, the config file and the command line (in rising order of
 * precedence). `knownKeys` lists the option names the command line accepts;
 * the config file may not use others.
 */
export function resolveOptions(
	cliOptions: Record<string, unknown>,
	positional: { destination?: string; mode?: string },
	configFromFile: Record<string, unknown>,
	knownKeys: string[],
): Options {
	Object.keys(configFromFile).forEach((k) => {
		if (!knownKeys.includes(k) && k != "destination" && k != "mode") {
			throw new ConfigError(`Unknown option in config file: ${k}`);
		}
	});

	const merged: Record<string, unknown> = {
		...defaultOptions,
		...configFromFile,
		...omit(cliOptions, ["file"]),
	};
	if (positional.destination) merged.destination = positional.destination;
	if (positional.mode) merged.mode = positional.mode;

	const mode = merged.mode;
	if (typeof mode !== "string") throw new ConfigError("mode must be a string");

	const pollInterval = toNumber(merged.pollInterval, "pollInterval", 1);
	return {
		destination: toOptionalString(merged.destination, "destination")?.replace(/\/+$/, ""),
		mode: parseMode(mode),
		manifest: toOptionalString(merged.manifest, "manifest") ?? defaultOptions.manifest,
		file: toOptionalString(cliOptions.file, "file"),
		stateRoot: toOptionalString(merged.stateRoot, "stateRoot") ?? defaultOptions.stateRoot,
		engine: parseEngine(merged.engine),
		insecure: merged.insecure === true,
		retries: Math.floor(toNumber(merged.retries, "retries", 0)),
		pushTimeout: toNumber(merged.pushTimeout, "pushTimeout", 0),
		pollInterval,
		lock: merged.lock !== false,
		verbose: merged.verbose === true,
	};
}
