/**
 * Newline framing for byte streams.
 *
 * Records are the bytes between consecutive LF (0x0a) bytes, trimmed of
 * surrounding ASCII whitespace. A CR before the LF is removed by the trim.
 */

const LF = 10;

/** Default upper bound for a single line, newline excluded. */
export const DEFAULT_MAX_LINE_BYTES = 64 * 1024;

function isSpace(byte: number): boolean {
	// \t \n \v \f \r and space
	return (byte >= 9 && byte <= 13) || byte === 32;
}

/**
 * Trim leading and trailing ASCII whitespace. Returns a view over `line`.
 */
export function trimSpace(line: Uint8Array): Uint8Array {
	let start = 0;
	let end = line.length;
	while (start < end && isSpace(line[start]!)) start++;
	while (end > start && isSpace(line[end - 1]!)) end--;
	return line.subarray(start, end);
}

function concatBuffer(a: Uint8Array, b: Uint8Array): Uint8Array {
	const c = new Uint8Array(a.length + b.length);
	c.set(a, 0);
	c.set(b, a.length);
	return c;
}

export class LineTooLongError extends Error {
	constructor(public readonly limit: number) {
		super(`Line exceeds ${limit} bytes`);
		this.name = "LineTooLongError";
	}
}

/** Records completed by one chunk, and the line that broke the limit, if any. */
export type DecodedChunk = {
	records: Uint8Array[];
	overflow?: LineTooLongError;
};

/**
 * Incremental line splitter.
 *
 * Feed chunks with {@link push}; each call returns the records completed by
 * that chunk, in order. Bytes after the last newline stay buffered until
 * more data arrives or {@link flush} is called at end of stream.
 */
export class LineDecoder {
	private buffer: Uint8Array = new Uint8Array();

	constructor(private readonly maxLineBytes: number = DEFAULT_MAX_LINE_BYTES) {}

	/**
	 * Split `chunk` into records. When a line (complete or still buffered) is
	 * longer than the limit, `records` holds the lines before it, `overflow`
	 * is set and the decoder drops everything it buffered.
	 */
	push(chunk: Uint8Array): DecodedChunk {
		const data =
			this.buffer.length === 0 ? chunk : concatBuffer(this.buffer, chunk);
		const records: Uint8Array[] = [];

		let start = 0;
		let index = data.indexOf(LF, start);
		while (index !== -1) {
			if (index - start > this.maxLineBytes) {
				return this.overflow(records);
			}
			// Copy so records never alias the caller's chunk.
			records.push(trimSpace(data.slice(start, index)));
			start = index + 1;
			index = data.indexOf(LF, start);
		}

		if (data.length - start > this.maxLineBytes) {
			return this.overflow(records);
		}
		this.buffer = data.slice(start);
		return { records };
	}

	private overflow(records: Uint8Array[]): DecodedChunk {
		this.buffer = new Uint8Array();
		return { records, overflow: new LineTooLongError(this.maxLineBytes) };
	}

	/**
	 * Return the trailing unterminated line, if any, and reset the buffer.
	 */
	flush(): Uint8Array | undefined {
		if (this.buffer.length === 0) return undefined;
		const rest = trimSpace(this.buffer);
		this.buffer = new Uint8Array();
		return rest;
	}

	/** Number of bytes held back waiting for a newline. */
	buffered(): number {
		return this.buffer.length;
	}
}
