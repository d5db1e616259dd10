import net from "node:net";
import createDebug from "debug";
import {
	abortedError,
	connectFailure,
	invalidAddressError,
	LineStreamError,
	readFailure,
} from "../../../error.js";
import type { ByteSource, Transport } from "../types.js";

const debug = createDebug("linestream:transport:tcp");

export const DEFAULT_CONNECT_TIMEOUT_MILLIS = 3000;

export type TcpTransportOptions = {
	/**
	 * Give up on a connect after this long.
	 * @default 3000
	 */
	connectTimeoutMillis?: number;
	/**
	 * Enable TCP keep-alive with this initial delay. Disabled when unset.
	 */
	keepAliveMillis?: number;
};

/**
 * Split `host:port` (or `[v6addr]:port`) into its parts.
 * Returns `undefined` when the address is not in that shape.
 */
export function parseAddress(
	address: string,
): { host: string; port: number } | undefined {
	const lastColon = address.lastIndexOf(":");
	if (lastColon <= 0) return undefined;

	let host = address.slice(0, lastColon);
	const portText = address.slice(lastColon + 1);
	if (host.startsWith("[") && host.endsWith("]")) {
		host = host.slice(1, -1);
	} else if (host.includes(":")) {
		// Bare IPv6 literals are ambiguous without brackets.
		return undefined;
	}
	if (!host || !/^\d+$/.test(portText)) return undefined;

	const port = Number(portText);
	if (port < 1 || port > 65535) return undefined;
	return { host, port };
}

function socketSource(
	socket: net.Socket,
	signal: AbortSignal,
	address: string,
): ByteSource {
	let finished = false;
	let onAbort = () => {};

	const finish = () => {
		finished = true;
		signal.removeEventListener("abort", onAbort);
	};

	return new ReadableStream<Uint8Array>({
		start(controller) {
			socket.on("data", (chunk: Buffer) => {
				if (finished) return;
				controller.enqueue(chunk);
				// Hold the socket until the reader catches up.
				if ((controller.desiredSize ?? 0) <= 0) socket.pause();
			});
			socket.once("end", () => {
				if (finished) return;
				finish();
				debug("%s closed by peer", address);
				controller.close();
			});
			socket.once("error", (err: Error) => {
				if (finished) return;
				finish();
				debug("%s errored: %s", address, err.message);
				controller.error(readFailure(address, err));
			});
			socket.once("close", () => {
				if (finished) return;
				finish();
				controller.error(
					new LineStreamError({
						message: `Connection to ${address} closed`,
						kind: "read",
						code: "ECONNRESET",
						address,
					}),
				);
			});

			onAbort = () => {
				if (finished) return;
				finish();
				controller.error(abortedError("Read cancelled", signal.reason));
				socket.destroy();
			};
			if (signal.aborted) {
				onAbort();
			} else {
				signal.addEventListener("abort", onAbort, { once: true });
			}
		},
		pull() {
			socket.resume();
		},
		cancel(reason) {
			finish();
			debug("releasing %s: %s", address, reason);
			socket.destroy();
		},
	});
}

/**
 * Transport over plain TCP. Addresses are `host:port`.
 *
 * The returned source pauses the socket while its queue is full, closes
 * when the peer ends the connection, and errors with a canceled failure
 * when `signal` aborts.
 */
export function createTcpTransport(
	options: TcpTransportOptions = {},
): Transport {
	const connectTimeoutMillis =
		options.connectTimeoutMillis ?? DEFAULT_CONNECT_TIMEOUT_MILLIS;

	return (signal, address) =>
		new Promise<ByteSource>((resolve, reject) => {
			const target = parseAddress(address);
			if (!target) {
				reject(invalidAddressError(address));
				return;
			}
			if (signal.aborted) {
				reject(abortedError("Connect cancelled", signal.reason));
				return;
			}

			debug("connecting to %s", address);
			const socket = net.createConnection({
				host: target.host,
				port: target.port,
			});

			const cleanup = () => {
				clearTimeout(timer);
				signal.removeEventListener("abort", onAbort);
				socket.off("connect", onConnect);
				socket.off("error", onError);
			};
			const fail = (error: LineStreamError) => {
				cleanup();
				socket.destroy();
				reject(error);
			};
			const onConnect = () => {
				cleanup();
				if (options.keepAliveMillis !== undefined) {
					socket.setKeepAlive(true, options.keepAliveMillis);
				}
				debug("connected to %s", address);
				resolve(socketSource(socket, signal, address));
			};
			const onError = (err: Error) => {
				fail(connectFailure(address, err));
			};
			const onAbort = () => {
				fail(abortedError("Connect cancelled", signal.reason));
			};
			const timer = setTimeout(() => {
				fail(
					new LineStreamError({
						message: `Connect to ${address} timed out after ${connectTimeoutMillis}ms`,
						kind: "connect",
						code: "ETIMEDOUT",
						address,
					}),
				);
			}, connectTimeoutMillis);

			socket.once("connect", onConnect);
			socket.once("error", onError);
			signal.addEventListener("abort", onAbort, { once: true });
		});
}
