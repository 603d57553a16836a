import { promises as fs } from "fs";
import * as fse from "fs-extra";

// fs errors are not instances of this realm's Error under some test runners
export function errorCode(e: unknown): string | undefined {
	if (e && typeof e === "object" && "code" in e && typeof e.code === "string") return e.code;
	return undefined;
}

export async function sizeOf(file: string) {
	try {
		return (await fs.lstat(file)).size;
	} catch (e) {
		if (errorCode(e) === "ENOENT") return 0;
		throw e;
	}
}

export async function removeFile(file: string) {
	await fse.remove(file);
}
