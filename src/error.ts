type ErrorWithCode = Error & {
	code?: unknown;
	cause?: unknown;
};

function getErrorCode(error: unknown): string | undefined {
	if (!(error instanceof Error)) return undefined;
	const err: ErrorWithCode = error;

	if (typeof err.code === "string") return err.code;

	if (err.cause && typeof err.cause === "object" && "code" in err.cause) {
		const code = err.cause.code;
		if (typeof code === "string") {
			return code;
		}
	}

	return undefined;
}

/**
 * Which stage of a reconnect cycle produced a failure.
 *
 * - `connect`: the transport could not produce a byte source
 * - `read`: the byte source ended, errored, or could not be decoded
 * - `canceled`: the cancellation signal fired (terminal)
 */
export type FailureKind = "connect" | "read" | "canceled";

/**
 * Error type used for every failure a reconnect cycle can end with.
 *
 * - `kind` tells the retry loop whether to reconnect or stop.
 * - `code` is a stable identifier (`END_OF_STREAM`, `ECONNREFUSED`, ...) when known.
 * - `address` names the endpoint the failure belongs to.
 */
export class LineStreamError extends Error {
	public readonly kind: FailureKind;
	public readonly code?: string;
	public readonly address?: string;

	constructor({
		message,
		kind,
		code,
		address,
		cause,
	}: {
		message: string;
		kind: FailureKind;
		code?: string;
		address?: string;
		cause?: unknown;
	}) {
		super(message, cause === undefined ? undefined : { cause });
		this.kind = kind;
		this.code = code;
		this.address = address;
		this.name = "LineStreamError";
	}
}

function isAbortError(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"name" in error &&
		error.name === "AbortError"
	);
}

/**
 * Normalise anything thrown by a transport or byte source.
 *
 * Existing {@link LineStreamError}s pass through untouched; `AbortError`s
 * become canceled failures; everything else is wrapped as `kind`.
 */
export function toLineStreamError(
	error: unknown,
	kind: "connect" | "read",
	address?: string,
): LineStreamError {
	if (error instanceof LineStreamError) {
		return error;
	}

	if (isAbortError(error)) {
		return abortedError("Read cancelled", error);
	}

	const code = getErrorCode(error);
	const detail =
		error instanceof Error ? error.message : String(error ?? "Unknown error");
	return new LineStreamError({
		message:
			kind === "connect"
				? `Connect to ${address ?? "<unknown>"} failed: ${detail}`
				: `Read from ${address ?? "<unknown>"} failed: ${detail}`,
		kind,
		code,
		address,
		cause: error,
	});
}

/** True when the failure means the caller asked to stop. */
export function isCanceled(error: unknown): boolean {
	return error instanceof LineStreamError && error.kind === "canceled";
}

/** Helper: construct a canceled failure. `reason` is the signal's abort reason. */
export function abortedError(
	message: string = "Read cancelled",
	reason?: unknown,
): LineStreamError {
	return new LineStreamError({
		message,
		kind: "canceled",
		code: "ABORTED",
		cause: reason,
	});
}

export function connectFailure(
	address: string,
	cause: unknown,
): LineStreamError {
	return toLineStreamError(cause, "connect", address);
}

export function readFailure(address: string, cause: unknown): LineStreamError {
	return toLineStreamError(cause, "read", address);
}

/** Helper: the byte source finished. Exhaustion is a read failure, never success. */
export function endOfStream(address: string): LineStreamError {
	return new LineStreamError({
		message: `Stream from ${address} ended`,
		kind: "read",
		code: "END_OF_STREAM",
		address,
	});
}

export function lineTooLong(address: string, limit: number): LineStreamError {
	return new LineStreamError({
		message: `Line from ${address} exceeds ${limit} bytes`,
		kind: "read",
		code: "LINE_TOO_LONG",
		address,
	});
}

export function invalidAddressError(address: string): LineStreamError {
	return new LineStreamError({
		message: `Invalid address: ${address} (expected host:port)`,
		kind: "connect",
		code: "INVALID_ADDRESS",
		address,
	});
}

/** Helper: the record queue was closed while a send or receive was pending. */
export function queueClosedError(): LineStreamError {
	return new LineStreamError({
		message: "Record queue is closed",
		kind: "canceled",
		code: "QUEUE_CLOSED",
	});
}
