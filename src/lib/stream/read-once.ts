import createDebug from "debug";
import {
	abortedError,
	connectFailure,
	endOfStream,
	LineStreamError,
	lineTooLong,
	readFailure,
	toLineStreamError,
} from "../../error.js";
import { raceAbort } from "../abort.js";
import {
	DEFAULT_MAX_LINE_BYTES,
	LineDecoder,
} from "../framing.js";
import type {
	ByteSource,
	CycleResult,
	ReadOptions,
	RecordSink,
	Transport,
} from "./types.js";

const debug = createDebug("linestream:read");

function deliveryFailure(
	error: unknown,
	signal: AbortSignal,
): LineStreamError {
	if (error instanceof LineStreamError) return error;
	if (signal.aborted) return abortedError("Delivery cancelled", signal.reason);
	// A sink that throws anything else is treated like a broken stream.
	return toLineStreamError(error, "read");
}

async function release(
	reader: ReadableStreamDefaultReader<Uint8Array>,
	address: string,
): Promise<void> {
	try {
		await reader.cancel("cycle ended");
		reader.releaseLock();
	} catch (err) {
		debug("failed to release byte source for %s: %s", address, err);
	}
}

async function connect(
	signal: AbortSignal,
	transport: Transport,
	address: string,
): Promise<ByteSource> {
	const pending = transport(signal, address);
	try {
		return await raceAbort(pending, signal);
	} catch (err) {
		if (signal.aborted) {
			// The transport may still hand over a source after we gave up on it.
			void pending.then(
				(source) =>
					source.cancel("connect abandoned").catch((cancelErr: unknown) => {
						debug("failed to cancel abandoned source: %s", cancelErr);
					}),
				() => undefined,
			);
		}
		throw err;
	}
}

/**
 * Run a single reconnect cycle: connect, then decode and deliver records
 * until the source ends, errors, or `signal` aborts.
 *
 * Never rejects and never retries. The returned failure tells the caller
 * why the cycle stopped:
 * - `connect`: the transport rejected
 * - `read`: the source errored, ran dry (`END_OF_STREAM`) or produced an
 *   over-long line (`LINE_TOO_LONG`)
 * - `canceled`: the signal fired; a record waiting for the sink is dropped
 */
export async function runOnce(
	signal: AbortSignal,
	transport: Transport,
	address: string,
	sink: RecordSink<Uint8Array>,
	options: ReadOptions = {},
): Promise<CycleResult> {
	if (signal.aborted) {
		return abortedError("Read cancelled", signal.reason);
	}

	let source: ByteSource;
	try {
		source = await connect(signal, transport, address);
	} catch (err) {
		debug("connect to %s failed: %s", address, err);
		return connectFailure(address, err);
	}

	const reader = source.getReader();
	const decoder = new LineDecoder(
		options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES,
	);
	let delivered = 0;

	const deliver = async (
		record: Uint8Array,
	): Promise<LineStreamError | undefined> => {
		try {
			await raceAbort(sink.send(record, signal), signal);
		} catch (err) {
			return deliveryFailure(err, signal);
		}
		delivered++;
		options.onRecord?.(record);
		return undefined;
	};

	try {
		while (true) {
			let chunk: ReadableStreamReadResult<Uint8Array>;
			try {
				chunk = await raceAbort(reader.read(), signal);
			} catch (err) {
				return readFailure(address, err);
			}

			if (chunk.done) {
				const rest = decoder.flush();
				if (rest !== undefined) {
					const failure = await deliver(rest);
					if (failure) return failure;
				}
				debug("stream from %s ended after %d records", address, delivered);
				return endOfStream(address);
			}

			const { records, overflow } = decoder.push(chunk.value);
			for (const record of records) {
				const failure = await deliver(record);
				if (failure) return failure;
			}
			if (overflow) {
				return lineTooLong(address, overflow.limit);
			}
		}
	} finally {
		// Not awaited; a source may never settle its cancel().
		void release(reader, address);
	}
}
