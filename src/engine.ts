import { promisify } from "node:util";
import { execFile } from "node:child_process";

import logger from "./logger";
import { EngineName } from "./types";
import { parseLoadedReference } from "./utils";

const execFileAsync = promisify(execFile);

export type CommandResult = { stdout: string; stderr: string };
export type CommandRunner = (binary: string, args: string[]) => Promise<CommandResult>;

export class EngineCommandError extends Error {
	constructor(
		readonly command: string,
		readonly exitCode: number | undefined,
		readonly stderr: string,
	) {
		super(`'${command}' failed${exitCode === undefined ? "" : ` with exit code ${exitCode}`}: ${stderr.trim()}`);
		this.name = "EngineCommandError";
	}
}

export interface ContainerEngine {
	readonly name: EngineName;
	pull(reference: string): Promise<void>;
	/** Loads an image archive and returns the reference it was loaded under, when the engine reports one. */
	load(archive: string): Promise<string | undefined>;
	/** Returns the image digest, or undefined when the image cannot be inspected. */
	inspectDigest(reference: string): Promise<string | undefined>;
	tag(source: string, target: string): Promise<void>;
	push(reference: string): Promise<void>;
	removeImage(reference: string): Promise<void>;
}

// docker reports the id with its algorithm prefix, podman without
const INSPECT_DIGEST_FORMAT: Record<EngineName, string> = {
	docker: "{{index .Id}}",
	podman: "sha256:{{.Id}}",
};

async function runCommand(binary: string, args: string[]): Promise<CommandResult> {
	const { stdout, stderr } = await execFileAsync(binary, args, { maxBuffer: 64 * 1024 * 1024 });
	return { stdout, stderr };
}

function exitCodeOf(e: unknown): number | undefined {
	if (e && typeof e === "object" && "code" in e && typeof e.code === "number") return e.code;
	return undefined;
}

function stderrOf(e: unknown): string {
	if (e && typeof e === "object" && "stderr" in e && typeof e.stderr === "string" && e.stderr) return e.stderr;
	return e instanceof Error ? e.message : String(e);
}

export class CliContainerEngine implements ContainerEngine {
	constructor(
		readonly name: EngineName,
		private readonly run: CommandRunner = runCommand,
	) {}

	private async exec(args: string[]): Promise<string> {
		const command = [this.name, ...args].join(" ");
		logger.debug(command);
		try {
			const { stdout } = await this.run(this.name, args);
			return stdout;
		} catch (e) {
			throw new EngineCommandError(command, exitCodeOf(e), stderrOf(e));
		}
	}

	async pull(reference: string) {
		await this.exec(["pull", reference]);
	}

	async load(archive: string) {
		const output = await this.exec(["load", "-i", archive]);
		return parseLoadedReference(output);
	}

	async inspectDigest(reference: string) {
		try {
			const digest = (await this.exec(["inspect", `--format=${INSPECT_DIGEST_FORMAT[this.name]}`, reference])).trim();
			return digest || undefined;
		} catch (e) {
			logger.debug(`Could not inspect ${reference}: ${e}`);
			return undefined;
		}
	}

	async tag(source: string, target: string) {
		await this.exec(["tag", source, target]);
	}

	async push(reference: string) {
		await this.exec(["push", reference]);
	}

	async removeImage(reference: string) {
		await this.exec(["image", "rm", reference]);
	}
}

export async function isAvailable(name: EngineName, run: CommandRunner = runCommand) {
	try {
		await run(name, ["-v"]);
	} catch (e) {
		logger.debug(`${name} not usable: ${e}`);
		return false;
	}
	return true;
}

/** Picks the engine to drive: the requested one, else docker when it answers, else podman. */
export async function detectEngine(requested?: EngineName, run: CommandRunner = runCommand): Promise<ContainerEngine> {
	if (requested) {
		if (!(await isAvailable(requested, run))) throw new Error(`${requested} executable not found on path.`);
		return new CliContainerEngine(requested, run);
	}
	for (const name of ["docker", "podman"] as const) {
		if (await isAvailable(name, run)) return new CliContainerEngine(name, run);
	}
	throw new Error("Neither docker nor podman was found on path. Unable to process images.");
}
