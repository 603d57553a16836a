import { ContainerEngine } from "./engine";
import { Downloader } from "./httpRequest";
import { StateStore } from "./markers";

/**
 * Tracks the marker this process currently owns mid-step, so an interrupt can
 * hand it back (`release`) instead of leaving it stuck for other processes.
 */
export class InFlight {
	private current?: { key: string; release: () => Promise<void> };

	begin(key: string, release: () => Promise<void>) {
		this.current = { key, release };
	}

	end() {
		this.current = undefined;
	}

	/** Writes the step's final marker state and stops tracking it. */
	async settle(write: () => Promise<void>) {
		await write();
		this.end();
	}

	async abandon(): Promise<string | undefined> {
		const current = this.current;
		this.current = undefined;
		if (!current) return undefined;
		await current.release();
		return current.key;
	}
}

export type MirrorContext = {
	destination: string;
	artifactBaseUrl?: string;
	// downloads land here, next to the markers
	workDir: string;
	total: number;
	engine: ContainerEngine;
	downloader: Downloader;
	store: StateStore;
	inFlight: InFlight;
	pushTimeoutMs: number;
	pollIntervalMs: number;
	sleep: (ms: number) => Promise<void>;
};
