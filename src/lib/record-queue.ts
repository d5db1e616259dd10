import createDebug from "debug";
import { abortedError, queueClosedError } from "../error.js";

const debug = createDebug("linestream:queue");

type ParkedSender<T> = {
	item: T;
	resolve: () => void;
	reject: (error: unknown) => void;
};

type ParkedReceiver<T> = {
	resolve: (item: T) => void;
	reject: (error: unknown) => void;
};

/**
 * Unbuffered handoff between one producer and its consumer.
 *
 * `send()` resolves only once a receiver has taken the item, so at most one
 * item is in flight and a slow consumer stalls the producer. Both sides
 * accept an abort signal; an aborted `send()` withdraws its item.
 */
export class RecordQueue<T> implements AsyncIterable<T> {
	private senders: Array<ParkedSender<T>> = [];
	private receivers: Array<ParkedReceiver<T>> = [];
	private closed = false;

	async send(item: T, signal?: AbortSignal): Promise<void> {
		if (this.closed) {
			throw queueClosedError();
		}
		if (signal?.aborted) {
			throw abortedError("Delivery cancelled", signal.reason);
		}

		const receiver = this.receivers.shift();
		if (receiver) {
			receiver.resolve(item);
			return;
		}

		return new Promise<void>((resolve, reject) => {
			const parked: ParkedSender<T> = {
				item,
				resolve: () => {
					signal?.removeEventListener("abort", onAbort);
					resolve();
				},
				reject: (error) => {
					signal?.removeEventListener("abort", onAbort);
					reject(error);
				},
			};
			const onAbort = () => {
				const index = this.senders.indexOf(parked);
				if (index !== -1) {
					this.senders.splice(index, 1);
					debug("send withdrawn on abort");
					parked.reject(abortedError("Delivery cancelled", signal?.reason));
				}
			};
			signal?.addEventListener("abort", onAbort, { once: true });
			this.senders.push(parked);
		});
	}

	async receive(signal?: AbortSignal): Promise<T> {
		const sender = this.senders.shift();
		if (sender) {
			sender.resolve();
			return sender.item;
		}
		if (this.closed) {
			throw queueClosedError();
		}
		if (signal?.aborted) {
			throw abortedError("Receive cancelled", signal.reason);
		}

		return new Promise<T>((resolve, reject) => {
			const parked: ParkedReceiver<T> = {
				resolve: (item) => {
					signal?.removeEventListener("abort", onAbort);
					resolve(item);
				},
				reject: (error) => {
					signal?.removeEventListener("abort", onAbort);
					reject(error);
				},
			};
			const onAbort = () => {
				const index = this.receivers.indexOf(parked);
				if (index !== -1) {
					this.receivers.splice(index, 1);
					parked.reject(abortedError("Receive cancelled", signal?.reason));
				}
			};
			signal?.addEventListener("abort", onAbort, { once: true });
			this.receivers.push(parked);
		});
	}

	/**
	 * Close the queue. Parked senders and receivers are rejected with a
	 * `QUEUE_CLOSED` failure; iteration ends.
	 */
	close(): void {
		if (this.closed) return;
		this.closed = true;
		debug(
			"closing, senders=%d receivers=%d",
			this.senders.length,
			this.receivers.length,
		);
		const senders = this.senders;
		const receivers = this.receivers;
		this.senders = [];
		this.receivers = [];
		for (const sender of senders) sender.reject(queueClosedError());
		for (const receiver of receivers) receiver.reject(queueClosedError());
	}

	isClosed(): boolean {
		return this.closed;
	}

	/** Number of sends waiting for a receiver. */
	pendingSenders(): number {
		return this.senders.length;
	}

	async *[Symbol.asyncIterator](): AsyncIterator<T> {
		while (true) {
			let item: T;
			try {
				item = await this.receive();
			} catch (error) {
				if (this.closed) return;
				throw error;
			}
			yield item;
		}
	}
}
