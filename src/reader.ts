import createDebug from "debug";
import type { LineReaderOptions } from "./common.js";
import { runUntilCanceled, sleep } from "./lib/retry.js";
import { RecordQueue } from "./lib/record-queue.js";
import type { Transport } from "./lib/stream/types.js";

const debug = createDebug("linestream:reader");

/**
 * Reads newline-delimited records from one address, reconnecting whenever
 * the connection fails, until stopped.
 *
 * Records are handed over one at a time: the reader does not read ahead of
 * the consumer. Iterate with `for await (const line of reader.lines())`
 * or over `reader.records()` for raw bytes.
 *
 * ```ts
 * const reader = LineReader.start("logs.internal:5140", createTcpTransport());
 * for await (const line of reader.lines()) {
 *   console.log(line);
 * }
 * ```
 */
export class LineReader {
	public readonly address: string;

	private readonly transport: Transport;
	private readonly options: LineReaderOptions;
	private readonly controller = new AbortController();
	private readonly queue = new RecordQueue<Uint8Array>();
	private loop?: Promise<void>;
	private failure?: unknown;
	private detachSignal: () => void = () => {};

	private _recordsRead = 0;
	private _attempts = 0;

	/**
	 * Create and start a reader.
	 */
	static start(
		address: string,
		transport: Transport,
		options?: LineReaderOptions,
	): LineReader {
		return new LineReader(address, transport, options).start();
	}

	constructor(
		address: string,
		transport: Transport,
		options: LineReaderOptions = {},
	) {
		if (!address.trim()) {
			throw new Error("Address cannot be empty");
		}
		this.address = address;
		this.transport = transport;
		this.options = options;

		const external = options.signal;
		if (external) {
			if (external.aborted) {
				this.controller.abort(external.reason);
				this.queue.close();
			} else {
				const onAbort = () => {
					void this.stop(external.reason);
				};
				external.addEventListener("abort", onAbort, { once: true });
				this.detachSignal = () => {
					external.removeEventListener("abort", onAbort);
				};
			}
		}
	}

	/**
	 * Start the reconnect loop. Calling it again has no effect.
	 */
	start(): this {
		if (this.loop) return this;

		const signal = this.controller.signal;
		const countingTransport: Transport = (signal, address) => {
			this._attempts++;
			return this.transport(signal, address);
		};

		debug("starting reader for %s", this.address);
		this.loop = runUntilCanceled(
			signal,
			countingTransport,
			this.address,
			this.queue,
			this.options.delay ?? sleep,
			{
				retry: this.options.retry,
				maxLineBytes: this.options.maxLineBytes,
				onRecord: () => {
					this._recordsRead++;
				},
			},
		)
			.then(
				() => {
					debug("reader for %s stopped", this.address);
				},
				(err: unknown) => {
					debug("reader for %s failed: %s", this.address, err);
					this.failure = err;
				},
			)
			.finally(() => {
				this.detachSignal();
				this.queue.close();
			});
		return this;
	}

	/**
	 * Stop reading. A record waiting for the consumer is dropped.
	 * Resolves once the reconnect loop has finished; safe to call repeatedly.
	 */
	async stop(reason: unknown = "stopped"): Promise<void> {
		if (!this.controller.signal.aborted) {
			debug("stopping reader for %s", this.address);
			this.controller.abort(reason);
		}
		this.detachSignal();
		this.queue.close();
		await this.done;
	}

	/** Resolves when the reconnect loop has terminated. */
	get done(): Promise<void> {
		return this.loop ?? Promise.resolve();
	}

	/**
	 * Records as raw bytes, in stream order. Ends when the reader stops.
	 */
	async *records(): AsyncGenerator<Uint8Array, void, undefined> {
		for await (const record of this.queue) {
			yield record;
		}
		if (this.failure !== undefined) {
			throw this.failure;
		}
	}

	/**
	 * Records decoded as UTF-8 strings.
	 */
	async *lines(): AsyncGenerator<string, void, undefined> {
		const decoder = new TextDecoder();
		for await (const record of this.records()) {
			yield decoder.decode(record);
		}
	}

	/** Records accepted by the consumer so far. */
	recordsRead(): number {
		return this._recordsRead;
	}

	/** Transport calls made so far, one per reconnect cycle. */
	attempts(): number {
		return this._attempts;
	}
}
