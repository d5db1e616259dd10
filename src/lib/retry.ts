import createDebug from "debug";
import type { RetryConfig } from "../common.js";
import { isCanceled, type LineStreamError } from "../error.js";
import { raceAbort } from "./abort.js";
import { runOnce } from "./stream/read-once.js";
import type {
	DelayFn,
	ReadOptions,
	RecordSink,
	Transport,
} from "./stream/types.js";

const debugRetry = createDebug("linestream:retry");

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
	minDelayMillis: 1000,
	maxDelayMillis: 30_000,
	jitter: 0.5,
};

/**
 * Calculates the delay before the next cycle: exponential from
 * `minDelayMillis`, capped at `maxDelayMillis`, with `jitter` spread.
 *
 * @param attempt 0-based count of consecutive cycles that delivered nothing
 */
export function calculateDelay(
	attempt: number,
	config: Required<RetryConfig>,
): number {
	const base = Math.min(
		config.maxDelayMillis,
		config.minDelayMillis * 2 ** Math.min(attempt, 30),
	);
	const factor = 1 + (Math.random() * 2 - 1) * config.jitter;
	return Math.floor(Math.max(0, base * factor));
}

/**
 * Sleeps for the specified duration, or until `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

export type RetryLoopOptions = ReadOptions & {
	retry?: RetryConfig;
	/**
	 * Called before each delay with the failure that ended the cycle, the
	 * 1-based number of that cycle, and the delay about to be applied.
	 */
	onRetry?: (
		failure: LineStreamError,
		cycle: number,
		delayMillis: number,
	) => void;
};

/**
 * Read `address` until `signal` aborts, reconnecting after every failure.
 *
 * Connect and read failures (including a source running dry) are retried
 * forever after a backoff delay; only cancellation ends the loop. The delay
 * function runs exactly once between consecutive cycles and races the
 * signal, so an abort during the wait ends the loop without another
 * transport call.
 */
export async function runUntilCanceled(
	signal: AbortSignal,
	transport: Transport,
	address: string,
	sink: RecordSink<Uint8Array>,
	delay: DelayFn = sleep,
	options: RetryLoopOptions = {},
): Promise<void> {
	const config: Required<RetryConfig> = {
		minDelayMillis:
			options.retry?.minDelayMillis ?? DEFAULT_RETRY_CONFIG.minDelayMillis,
		maxDelayMillis:
			options.retry?.maxDelayMillis ?? DEFAULT_RETRY_CONFIG.maxDelayMillis,
		jitter: options.retry?.jitter ?? DEFAULT_RETRY_CONFIG.jitter,
	};

	// Consecutive cycles that delivered nothing; drives the backoff.
	let attempt = 0;
	let cycle = 0;

	while (true) {
		cycle++;
		let delivered = 0;
		const failure = await runOnce(signal, transport, address, sink, {
			maxLineBytes: options.maxLineBytes,
			onRecord: (record) => {
				delivered++;
				options.onRecord?.(record);
			},
		});

		if (isCanceled(failure) || signal.aborted) {
			debugRetry("cycle %d on %s cancelled, stopping", cycle, address);
			return;
		}

		if (delivered > 0) {
			attempt = 0;
		}

		const delayMillis = calculateDelay(attempt, config);
		debugRetry(
			"cycle %d on %s failed (%s, code=%s), retrying after %dms",
			cycle,
			address,
			failure.message,
			failure.code,
			delayMillis,
		);
		options.onRetry?.(failure, cycle, delayMillis);

		try {
			await raceAbort(delay(delayMillis, signal), signal);
		} catch (err) {
			if (signal.aborted) {
				debugRetry("cancelled while waiting to retry %s", address);
				return;
			}
			throw err;
		}
		attempt++;
	}
}
