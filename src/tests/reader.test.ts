import { describe, expect, it, vi } from "vitest";
import type { DelayFn, Transport } from "../lib/stream/types.js";
import { LineReader } from "../reader.js";
import { noDelay, repeatingSource, text, within } from "./helpers.js";

const ADDRESS = "logs.internal:5140";

const oneRecordPerConnection = () =>
	vi.fn<Transport>(async (signal, address) =>
		repeatingSource(signal, address, 1),
	);

describe("LineReader", () => {
	it("yields lines across reconnects until the consumer stops it", async () => {
		const transport = oneRecordPerConnection();
		const reader = LineReader.start(ADDRESS, transport, { delay: noDelay });

		const lines: string[] = [];
		for await (const line of reader.lines()) {
			lines.push(line);
			if (lines.length === 3) break;
		}
		await within(reader.stop(), 1000);

		expect(lines).toEqual([ADDRESS, ADDRESS, ADDRESS]);
		expect(reader.recordsRead()).toBe(3);
		expect(reader.attempts()).toBeGreaterThanOrEqual(3);
	});

	it("yields raw records as bytes", async () => {
		const reader = LineReader.start(ADDRESS, oneRecordPerConnection(), {
			delay: noDelay,
		});

		const iterator = reader.records();
		const first = await iterator.next();
		await reader.stop();

		expect(first.done).toBe(false);
		expect(first.value).toBeInstanceOf(Uint8Array);
		expect(first.value && text(first.value)).toBe(ADDRESS);
		await expect(iterator.next()).resolves.toEqual({
			done: true,
			value: undefined,
		});
	});

	it("ends iteration when stopped while the consumer waits", async () => {
		const transport = vi.fn<Transport>(async () => {
			throw new Error("unreachable");
		});
		const delay: DelayFn = (_ms, signal) =>
			new Promise((resolve) =>
				signal.addEventListener("abort", () => resolve(), { once: true }),
			);
		const reader = LineReader.start(ADDRESS, transport, { delay });

		const consuming = (async () => {
			const lines: string[] = [];
			for await (const line of reader.lines()) lines.push(line);
			return lines;
		})();
		await vi.waitFor(() => expect(transport).toHaveBeenCalledTimes(1));
		await reader.stop();

		await expect(within(consuming, 1000)).resolves.toEqual([]);
		expect(reader.attempts()).toBe(1);
	});

	it("stops when the external signal aborts", async () => {
		const controller = new AbortController();
		const reader = LineReader.start(ADDRESS, oneRecordPerConnection(), {
			delay: noDelay,
			signal: controller.signal,
		});

		const lines: string[] = [];
		for await (const line of reader.lines()) {
			lines.push(line);
			if (lines.length === 2) controller.abort("shutdown");
		}
		await within(reader.done, 1000);

		expect(lines).toEqual([ADDRESS, ADDRESS]);
	});

	it("detaches from the external signal once stopped", async () => {
		const controller = new AbortController();
		const removed = vi.spyOn(controller.signal, "removeEventListener");
		const reader = LineReader.start(ADDRESS, oneRecordPerConnection(), {
			delay: noDelay,
			signal: controller.signal,
		});

		for await (const _line of reader.lines()) break;
		await within(reader.stop(), 1000);

		expect(removed).toHaveBeenCalledWith("abort", expect.any(Function));
	});

	it("never connects when the external signal already fired", async () => {
		const controller = new AbortController();
		controller.abort();
		const transport = oneRecordPerConnection();
		const reader = LineReader.start(ADDRESS, transport, {
			signal: controller.signal,
		});

		const lines: string[] = [];
		for await (const line of reader.lines()) lines.push(line);
		await reader.done;

		expect(lines).toEqual([]);
		expect(transport).not.toHaveBeenCalled();
	});

	it("can be stopped before and after starting, repeatedly", async () => {
		const transport = oneRecordPerConnection();
		const reader = new LineReader(ADDRESS, transport, { delay: noDelay });

		await reader.stop();
		await reader.stop("again");
		reader.start();
		await within(reader.done, 1000);

		expect(transport).not.toHaveBeenCalled();
		expect(reader.attempts()).toBe(0);
	});

	it("surfaces a broken delay function to the consumer", async () => {
		const reader = LineReader.start(
			ADDRESS,
			async () => {
				throw new Error("refused");
			},
			{
				delay: async () => {
					throw new Error("broken timer");
				},
			},
		);

		const consume = async () => {
			for await (const _line of reader.lines()) {
				// drain
			}
		};
		await expect(consume()).rejects.toThrow("broken timer");
	});

	it("rejects an empty address", () => {
		expect(() => new LineReader("  ", oneRecordPerConnection())).toThrow(
			"Address cannot be empty",
		);
	});
});
