// =============================================================================
// Core Reader
// =============================================================================

/** Top-level entrypoint: a reconnecting line reader for one address. */
export { LineReader } from "./reader.js";

// =============================================================================
// Read Loop
// =============================================================================

export { runOnce } from "./lib/stream/read-once.js";
export {
	calculateDelay,
	DEFAULT_RETRY_CONFIG,
	type RetryLoopOptions,
	runUntilCanceled,
	sleep,
} from "./lib/retry.js";
export { RecordQueue } from "./lib/record-queue.js";
export {
	DEFAULT_MAX_LINE_BYTES,
	LineDecoder,
	LineTooLongError,
	trimSpace,
} from "./lib/framing.js";

// =============================================================================
// Transports
// =============================================================================

export {
	createTcpTransport,
	DEFAULT_CONNECT_TIMEOUT_MILLIS,
	parseAddress,
	type TcpTransportOptions,
} from "./lib/stream/transport/tcp.js";
export type {
	ByteSource,
	CycleResult,
	DelayFn,
	ReadOptions,
	RecordSink,
	Transport,
} from "./lib/stream/types.js";

// =============================================================================
// Configuration & Errors
// =============================================================================

export {
	type LineReaderOptions,
	LineStreamEnvironment,
	type LineStreamEnvironmentConfig,
	type RetryConfig,
} from "./common.js";
export {
	abortedError,
	type FailureKind,
	isCanceled,
	LineStreamError,
	toLineStreamError,
} from "./error.js";
