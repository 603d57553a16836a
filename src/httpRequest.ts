import * as https from "https";
import * as http from "http";
import * as fss from "fs";
import { pipeline } from "stream/promises";
import { OutgoingHttpHeaders } from "http";

import logger from "./logger";
import { sizeOf } from "./fileutil";
import { InsecureRegistrySupport } from "./types";
import { sleep } from "./utils";

export const redirectCodes = [308, 307, 303, 302, 301];
// same set curl --retry treats as transient
const retryableStatusCodes = [408, 429, 500, 502, 503, 504];
const MAX_RETRY_DELAY_MS = 10 * 60 * 1000;

export function isOk(httpStatus: number) {
	return httpStatus >= 200 && httpStatus < 300;
}

export class HttpStatusError extends Error {
	constructor(
		readonly statusCode: number,
		statusMessage: string | undefined,
		readonly url: string,
	) {
		super(`Unexpected HTTP status ${statusCode} : ${statusMessage ?? ""} (${url})`);
		this.name = "HttpStatusError";
	}
}

export function createHttpOptions(method: "GET", url: string, headers: OutgoingHttpHeaders): https.RequestOptions {
	const u = new URL(url);
	return {
		protocol: u.protocol,
		hostname: u.hostname,
		port: u.port,
		path: u.pathname + u.search,
		headers,
		method,
	};
}

export function request(
	options: https.RequestOptions,
	allowInsecure: InsecureRegistrySupport,
	callback: (res: http.IncomingMessage) => void,
	onError: (e: Error) => void,
) {
	if (allowInsecure == InsecureRegistrySupport.YES) options.rejectUnauthorized = false;
	const req = (options.protocol == "https:" ? https : http).request(options, (res) => {
		callback(res);
	});
	req.on("error", (e) => {
		logger.debug("ERROR: " + e, options.method, options.path);
		onError(e);
	});
	return req;
}

type Callback = (result: { error: Error } | { res: http.IncomingMessage }) => void;

export function followRedirects(
	uri: string,
	headers: OutgoingHttpHeaders,
	allowInsecure: InsecureRegistrySupport,
	cb: Callback,
	count = 0,
) {
	logger.debug("GET", uri, headers.range ?? "");
	const options = createHttpOptions("GET", uri, headers);
	request(
		options,
		allowInsecure,
		(res) => {
			if (redirectCodes.includes(res.statusCode ?? 0)) {
				res.resume();
				if (count > 10) return cb({ error: new Error("Too many redirects for " + uri) });
				const location = res.headers.location;
				if (!location) return cb({ error: new Error("Redirect, but missing location header") });
				return followRedirects(new URL(location, uri).toString(), headers, allowInsecure, cb, count + 1);
			}
			cb({ res });
		},
		(error) => cb({ error }),
	).end();
}

/**
 * Fetches `uri` into `file`. A non-empty `file` is resumed with a Range
 * request; a server that ignores the range restarts the file from scratch.
 */
export async function fetchToFile(uri: string, file: string, allowInsecure: InsecureRegistrySupport): Promise<void> {
	const offset = await sizeOf(file);
	const headers: OutgoingHttpHeaders = offset > 0 ? { range: `bytes=${offset}-` } : {};
	const res = await new Promise<http.IncomingMessage>((resolve, reject) => {
		followRedirects(uri, headers, allowInsecure, (result) => {
			if ("error" in result) return reject(result.error);
			resolve(result.res);
		});
	});
	const status = res.statusCode ?? 0;
	logger.debug(status, res.statusMessage, res.headers["content-type"], res.headers["content-length"]);
	if (status == 416 && offset > 0) {
		res.resume();
		logger.debug(`${file} is already complete (${offset} bytes)`);
		return;
	}
	if (!isOk(status)) {
		res.resume();
		throw new HttpStatusError(status, res.statusMessage, uri);
	}
	const append = status == 206 && offset > 0;
	if (offset > 0) {
		logger.info(append ? `Resuming ${file} at byte ${offset}` : `Server ignored range request, restarting ${file}`);
	}
	await pipeline(res, fss.createWriteStream(file, { flags: append ? "a" : "w" }));
}

export interface Downloader {
	download(url: string, file: string): Promise<void>;
}

export type DownloadOptions = {
	retries: number;
	allowInsecure: InsecureRegistrySupport;
	retryDelayMs?: number;
};

function isRetryable(e: unknown) {
	if (e instanceof HttpStatusError) return retryableStatusCodes.includes(e.statusCode);
	return true;
}

export class HttpDownloader implements Downloader {
	constructor(private readonly options: DownloadOptions) {}

	async download(url: string, file: string) {
		const { retries, allowInsecure, retryDelayMs = 1000 } = this.options;
		for (let attempt = 0; ; attempt++) {
			try {
				await fetchToFile(url, file, allowInsecure);
				return;
			} catch (e) {
				if (attempt >= retries || !isRetryable(e)) throw e;
				const delay = Math.min(retryDelayMs * 2 ** attempt, MAX_RETRY_DELAY_MS);
				logger.warn(`Download of ${url} failed (${e}). Retrying in ${delay}ms (${attempt + 1}/${retries})`);
				await sleep(delay);
			}
		}
	}
}
