/* eslint-disable no-console */

let debugEnabled = false;

type Sink = typeof console.log;

function timeString(): string {
	return new Date().toISOString();
}
function dolog(sink: Sink, parts: unknown[]) {
	sink.apply(console, [timeString() as unknown].concat(parts));
}
type Level = "error" | "warn" | "info" | "debug";

function log(level: Level, msg: unknown[]) {
	if (level == "error") return dolog(console.error, ["ERROR" as unknown].concat(msg));
	if (level == "warn") return dolog(console.error, ["WARN" as unknown].concat(msg));
	if (level == "info") return dolog(console.log, msg);
	if (level == "debug" && debugEnabled) return dolog(console.log, ["DEBUG" as unknown].concat(msg));
}

const logger = {
	enableDebug: () => (debugEnabled = true),
	info: function (...msg: unknown[]) {
		log("info", msg);
	},
	warn: function (...msg: unknown[]) {
		log("warn", msg);
	},
	error: function (...msg: unknown[]) {
		log("error", msg);
	},
	debug: function (...msg: unknown[]) {
		log("debug", msg);
	},
};

export default logger;
