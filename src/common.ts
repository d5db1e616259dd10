import type { DelayFn } from "./lib/stream/types.js";

/**
 * Backoff between reconnect cycles. There is no attempt limit: a failing
 * address is retried until the reader is cancelled.
 */
export type RetryConfig = {
	/**
	 * Delay after the first failed cycle, and after any cycle that delivered
	 * at least one record.
	 * @default 1000
	 */
	minDelayMillis?: number;

	/**
	 * Upper bound for the exponential backoff base.
	 * @default 30000
	 */
	maxDelayMillis?: number;

	/**
	 * Random spread applied around the base delay, as a fraction of it.
	 * `0.5` picks a delay in [0.5x, 1.5x); `0` makes delays deterministic.
	 * @default 0.5
	 */
	jitter?: number;
};

/**
 * Options for {@link LineReader}.
 */
export type LineReaderOptions = {
	/** Backoff between reconnect cycles. */
	retry?: RetryConfig;
	/**
	 * Replaces the timer-based sleep between cycles; a no-op retries at once.
	 */
	delay?: DelayFn;
	/**
	 * Longest accepted line in bytes; longer lines end the cycle.
	 * @default 65536
	 */
	maxLineBytes?: number;
	/** Stops the reader when aborted. */
	signal?: AbortSignal;
};

export type LineStreamEnvironmentConfig = {
	address?: string;
	retry?: RetryConfig;
	maxLineBytes?: number;
};

function positiveInt(name: string, raw: string): number {
	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`${name} must be a positive integer, got "${raw}"`);
	}
	return value;
}

export class LineStreamEnvironment {
	public static parse(
		env: Record<string, string | undefined> = process.env,
	): LineStreamEnvironmentConfig {
		const config: LineStreamEnvironmentConfig = {};

		const address = env.LINESTREAM_ADDRESS?.trim();
		if (address) {
			config.address = address;
		}

		const retry: RetryConfig = {};
		const minDelay = env.LINESTREAM_MIN_DELAY_MS;
		if (minDelay) {
			retry.minDelayMillis = positiveInt("LINESTREAM_MIN_DELAY_MS", minDelay);
		}

		const maxDelay = env.LINESTREAM_MAX_DELAY_MS;
		if (maxDelay) {
			retry.maxDelayMillis = positiveInt("LINESTREAM_MAX_DELAY_MS", maxDelay);
		}

		if (Object.keys(retry).length > 0) {
			config.retry = retry;
		}

		const maxLineBytes = env.LINESTREAM_MAX_LINE_BYTES;
		if (maxLineBytes) {
			config.maxLineBytes = positiveInt(
				"LINESTREAM_MAX_LINE_BYTES",
				maxLineBytes,
			);
		}

		return config;
	}
}
