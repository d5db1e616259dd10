import type { RecordQueue } from "../lib/record-queue.js";
import type { ByteSource, DelayFn } from "../lib/stream/types.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const text = (record: Uint8Array): string => decoder.decode(record);

export const noDelay: DelayFn = async () => {};

/** Let pending promise callbacks and stream pulls run. */
export const tick = () =>
	new Promise<void>((resolve) => setImmediate(() => resolve()));

export const abortError = () => new DOMException("aborted", "AbortError");

/**
 * Source that yields `line` followed by a newline as one chunk per read,
 * `limit` times, then errors with "count exceeded". Reads after `signal`
 * aborts error with an AbortError.
 */
export function repeatingSource(
	signal: AbortSignal,
	line: string,
	limit: number,
): ByteSource {
	let remaining = limit;
	return new ReadableStream<Uint8Array>(
		{
			pull(controller) {
				if (signal.aborted) {
					controller.error(abortError());
					return;
				}
				if (remaining <= 0) {
					controller.error(new Error("count exceeded"));
					return;
				}
				remaining--;
				controller.enqueue(encoder.encode(`${line}\n`));
			},
		},
		{ highWaterMark: 0 },
	);
}

/**
 * Source that yields `chunks` one per read, then either closes or errors
 * with `error`.
 */
export function chunkSource(
	chunks: string[],
	error?: unknown,
): ByteSource {
	let index = 0;
	return new ReadableStream<Uint8Array>(
		{
			pull(controller) {
				const chunk = chunks[index];
				if (chunk !== undefined) {
					index++;
					controller.enqueue(encoder.encode(chunk));
				} else if (error !== undefined) {
					controller.error(error);
				} else {
					controller.close();
				}
			},
		},
		{ highWaterMark: 0 },
	);
}

/**
 * Source that yields `chunks` and then never produces another read.
 * `cancelled` receives the reason passed to `cancel()`.
 */
export function stallingSource(
	chunks: string[],
	cancelled: unknown[] = [],
): ByteSource {
	let index = 0;
	return new ReadableStream<Uint8Array>(
		{
			pull(controller) {
				const chunk = chunks[index];
				if (chunk !== undefined) {
					index++;
					controller.enqueue(encoder.encode(chunk));
					return;
				}
				return new Promise<void>(() => {});
			},
			cancel(reason) {
				cancelled.push(reason);
			},
		},
		{ highWaterMark: 0 },
	);
}

/** Receive `count` records from `queue` as strings. */
export async function take(
	queue: RecordQueue<Uint8Array>,
	count: number,
): Promise<string[]> {
	const received: string[] = [];
	for (let i = 0; i < count; i++) {
		received.push(text(await queue.receive()));
	}
	return received;
}

/** Resolve with `value`, or reject if `promise` takes longer than `ms`. */
export function within<T>(promise: Promise<T>, ms: number): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(
			() => reject(new Error(`timed out after ${ms}ms`)),
			ms,
		);
		promise.then(
			(value) => {
				clearTimeout(timer);
				resolve(value);
			},
			(err: unknown) => {
				clearTimeout(timer);
				reject(err);
			},
		);
	});
}
