import * as path from "path";
import * as fse from "fs-extra";

// package.json sits one level above both src/ and dist/
function readVersion(): string {
	const pkg: unknown = fse.readJsonSync(path.join(__dirname, "..", "package.json"), { throws: false });
	if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") return pkg.version;
	return "0.0.0";
}

export const VERSION = readVersion();
