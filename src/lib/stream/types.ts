import type { LineStreamError } from "../../error.js";

/**
 * Raw bytes from one connection. Owned by a single reconnect cycle and
 * released with `cancel()` when that cycle ends.
 *
 * A source may be cancellation-aware: erroring with an `AbortError` (or a
 * canceled {@link LineStreamError}) when its signal fires is reported as
 * cancellation rather than as a read failure.
 */
export type ByteSource = ReadableStream<Uint8Array>;

/**
 * Transport capability: open a byte source for `address`.
 *
 * - Rejects when no connection could be made (a connect failure).
 * - Should honour `signal` for the connect and for every read on the
 *   returned source.
 */
export type Transport = (
	signal: AbortSignal,
	address: string,
) => Promise<ByteSource>;

/**
 * Suspend the caller for `ms` milliseconds.
 * Implementations should resolve early when `signal` aborts.
 */
export type DelayFn = (ms: number, signal: AbortSignal) => Promise<void>;

/** Where records go. {@link RecordQueue} is the default implementation. */
export interface RecordSink<T> {
	send(item: T, signal?: AbortSignal): Promise<void>;
}

export type ReadOptions = {
	/**
	 * Longest accepted line in bytes, newline excluded.
	 * @default 65536
	 */
	maxLineBytes?: number;
	/** Called after each record the sink accepted. */
	onRecord?: (record: Uint8Array) => void;
};

/**
 * Outcome of one reconnect cycle. Always a failure: a source running dry
 * is reported as an `END_OF_STREAM` read failure.
 */
export type CycleResult = LineStreamError;
