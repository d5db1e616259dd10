import {
	createTcpTransport,
	LineReader,
	LineStreamEnvironment,
	LineStreamError,
} from "../src/index.js";

const config = LineStreamEnvironment.parse();
const address = config.address ?? process.argv[2];
if (!address) {
	throw new Error("Set LINESTREAM_ADDRESS or pass host:port as an argument.");
}

// Ctrl-C stops the reader; a record waiting to be printed is dropped.
const shutdown = new AbortController();
process.once("SIGINT", () => shutdown.abort("interrupted"));

const reader = LineReader.start(address, createTcpTransport(), {
	retry: config.retry,
	maxLineBytes: config.maxLineBytes,
	signal: shutdown.signal,
});

try {
	for await (const line of reader.lines()) {
		console.log(line);
	}
} catch (error: unknown) {
	if (error instanceof LineStreamError) {
		console.error("reader failed (%s): %s", error.code, error.message);
		process.exitCode = 1;
	} else {
		throw error;
	}
}

console.error(
	"read %d records over %d connections",
	reader.recordsRead(),
	reader.attempts(),
);
