import assert from "node:assert";
import { describe, test } from "node:test";
import { mergeStreams, sentenceLines, splitProportionally } from "./merge.ts";

describe("Merger", () => {
	describe("splitProportionally", () => {
		test("should divide the range by line length", () => {
			const parts = splitProportionally("00:00:00,000 --> 00:00:10,000", ["abc", "defghij"]);

			assert.deepStrictEqual(parts, [
				{
					start: { kind: "time", ms: 0, separator: "," },
					end: { kind: "time", ms: 3000, separator: "," },
					text: "abc",
				},
				{
					start: { kind: "time", ms: 3000, separator: "," },
					end: { kind: "time", ms: 10000, separator: "," },
					text: "defghij",
				},
			]);
		});

		test("should end the last line on the original end time", () => {
			const parts = splitProportionally("00:00:00,000 --> 00:00:01,000", ["a", "b", "c"]);

			assert.deepStrictEqual(
				parts.map((p) => (p.end.kind === "time" ? p.end.ms : -1)),
				[333, 666, 1000]
			);
		});

		test("should weigh by code points", () => {
			const parts = splitProportionally("00:00:00.000 --> 00:00:01.000", ["😀😀", "ab"]);

			assert.deepStrictEqual(parts[0]?.end, { kind: "time", ms: 500, separator: "." });
		});

		test("should reject ranges it cannot divide", () => {
			assert.throws(() => splitProportionally("not a range", ["a", "b"]), /Invalid time range/);
			assert.throws(() => splitProportionally("00:00:01,000 --> 00:99:00,000", ["a", "b"]), /Unparseable timestamp/);
			assert.throws(
				() => splitProportionally("00:00:05,000 --> 00:00:01,000", ["a", "b"]),
				/ends before it starts/
			);
			assert.throws(() => splitProportionally("00:00:00,000 --> 00:00:01,000", ["", ""]), /zero total length/);
		});
	});

	describe("sentenceLines", () => {
		test("should drop an echoed index line", () => {
			assert.deepStrictEqual(sentenceLines("5\nHallo", "5"), ["Hallo"]);
		});

		test("should keep a number that is not the index", () => {
			assert.deepStrictEqual(sentenceLines("42", "5"), ["42"]);
		});

		test("should keep text without an index and drop blank lines", () => {
			assert.deepStrictEqual(sentenceLines("Hallo\n  \nWelt", "1"), ["Hallo", "Welt"]);
		});
	});

	describe("mergeStreams", () => {
		test("should split multi-line entries into timed cues", () => {
			const result = mergeStreams("1\n00:00:00,000 --> 00:00:10,000\n\n", "1\nabc\ndefghij\n\n");

			assert.strictEqual(
				result.srt,
				"1\n00:00:00,000 --> 00:00:03,000\nabc\n\n2\n00:00:03,000 --> 00:00:10,000\ndefghij\n"
			);
		});

		test("should carry cue settings onto every split cue", () => {
			const result = mergeStreams("1\n00:00:00,000 --> 00:00:10,000 X1:40\n\n", "1\nabc\ndefghij\n\n");

			assert.strictEqual(
				result.srt,
				"1\n00:00:00,000 --> 00:00:03,000 X1:40\nabc\n\n2\n00:00:03,000 --> 00:00:10,000 X1:40\ndefghij\n"
			);
		});

		test("should keep multi-line entries together when splitting is off", () => {
			const result = mergeStreams("1\n00:00:00,000 --> 00:00:10,000\n\n", "1\nabc\ndefghij\n\n", {
				splitMultiLine: false,
			});

			assert.strictEqual(result.srt, "1\n00:00:00,000 --> 00:00:10,000\nabc\ndefghij\n");
		});

		test("should renumber from one", () => {
			const result = mergeStreams(
				"7\n00:00:01,000 --> 00:00:02,000\n\n9\n00:00:03,000 --> 00:00:04,000\n\n",
				"7\nSieben\n\n9\nNeun\n\n"
			);

			assert.strictEqual(
				result.srt,
				"1\n00:00:01,000 --> 00:00:02,000\nSieben\n\n2\n00:00:03,000 --> 00:00:04,000\nNeun\n"
			);
		});

		test("should fall back to one block when a range cannot be divided", () => {
			const result = mergeStreams("1\n00:00:05,000 --> 00:00:01,000\n\n", "1\na\nb\n\n");

			assert.strictEqual(result.srt, "1\n00:00:05,000 --> 00:00:01,000\na\nb\n");
			assert.deepStrictEqual(result.diagnostics, [
				{
					kind: "split-fallback",
					position: 0,
					index: "1",
					reason: 'Time range ends before it starts: "00:00:05,000 --> 00:00:01,000"',
				},
			]);
		});

		test("should drop entries with no text left", () => {
			const result = mergeStreams(
				"1\n00:00:01,000 --> 00:00:02,000\n\n2\n00:00:03,000 --> 00:00:04,000\n\n3\n00:00:05,000 --> 00:00:06,000\n\n",
				"1\nA\n\n2\n\n\n3\nC\n\n"
			);

			assert.strictEqual(
				result.srt,
				"1\n00:00:01,000 --> 00:00:02,000\nA\n\n2\n00:00:05,000 --> 00:00:06,000\nC\n"
			);
			assert.deepStrictEqual(result.diagnostics, [{ kind: "dropped-empty", position: 1, index: "2" }]);
		});

		test("should merge only the common prefix of uneven streams", () => {
			const result = mergeStreams(
				"1\n00:00:01,000 --> 00:00:02,000\n\n2\n00:00:03,000 --> 00:00:04,000\n\n",
				"1\nOnly one\n\n"
			);

			assert.strictEqual(result.blocks.length, 1);
			assert.deepStrictEqual(result.diagnostics, [{ kind: "length-mismatch", timeChunks: 2, sentenceChunks: 1 }]);
		});

		test("should skip time chunks without a range line", () => {
			const result = mergeStreams("1\n\n2\n00:00:03,000 --> 00:00:04,000\n\n", "1\nA\n\n2\nB\n\n");

			assert.strictEqual(result.srt, "1\n00:00:03,000 --> 00:00:04,000\nB\n");
			assert.deepStrictEqual(result.diagnostics, [{ kind: "skipped-time-chunk", position: 0 }]);
		});

		test("should produce nothing for empty streams", () => {
			assert.deepStrictEqual(mergeStreams("", ""), { srt: "", blocks: [], diagnostics: [] });
		});
	});
});
