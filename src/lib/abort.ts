import { abortedError } from "../error.js";

/**
 * Race a pending operation against an abort signal.
 *
 * Rejects with a canceled {@link LineStreamError} as soon as the signal
 * fires (or immediately if it already has). The operation itself is not
 * interrupted; its eventual outcome is ignored.
 */
export function raceAbort<T>(
	operation: Promise<T>,
	signal: AbortSignal,
): Promise<T> {
	if (signal.aborted) {
		// Keep a late rejection from surfacing as unhandled.
		operation.catch(() => undefined);
		return Promise.reject(abortedError("Read cancelled", signal.reason));
	}

	return new Promise<T>((resolve, reject) => {
		const onAbort = () => {
			reject(abortedError("Read cancelled", signal.reason));
		};
		signal.addEventListener("abort", onAbort, { once: true });
		operation.then(
			(value) => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			},
		);
	});
}
