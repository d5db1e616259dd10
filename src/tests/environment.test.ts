import { describe, expect, it } from "vitest";
import { LineStreamEnvironment } from "../common.js";

describe("LineStreamEnvironment.parse", () => {
	it("returns an empty config when nothing is set", () => {
		expect(LineStreamEnvironment.parse({})).toEqual({});
	});

	it("reads address, backoff and line limit", () => {
		const config = LineStreamEnvironment.parse({
			LINESTREAM_ADDRESS: " logs.internal:5140 ",
			LINESTREAM_MIN_DELAY_MS: "250",
			LINESTREAM_MAX_DELAY_MS: "5000",
			LINESTREAM_MAX_LINE_BYTES: "1024",
		});

		expect(config).toEqual({
			address: "logs.internal:5140",
			retry: { minDelayMillis: 250, maxDelayMillis: 5000 },
			maxLineBytes: 1024,
		});
	});

	it("ignores empty values", () => {
		expect(
			LineStreamEnvironment.parse({
				LINESTREAM_ADDRESS: "",
				LINESTREAM_MIN_DELAY_MS: "",
			}),
		).toEqual({});
	});

	it("rejects values that are not positive integers", () => {
		expect(() =>
			LineStreamEnvironment.parse({ LINESTREAM_MIN_DELAY_MS: "soon" }),
		).toThrow('LINESTREAM_MIN_DELAY_MS must be a positive integer, got "soon"');
		expect(() =>
			LineStreamEnvironment.parse({ LINESTREAM_MAX_LINE_BYTES: "0" }),
		).toThrow("LINESTREAM_MAX_LINE_BYTES must be a positive integer");
	});
});
