import assert from "node:assert";
import { describe, test } from "node:test";
import {
	analyzeTranslationFailure,
	checkFormat,
	checkSequentialNumbering,
	describeValidationResult,
	filterBannerLines,
	validateTranslationResult,
} from "./validation.ts";

describe("Validation Module", () => {
	describe("checkFormat", () => {
		test("should accept blank-line separated entries", () => {
			assert.deepStrictEqual(checkFormat("1\nhello\n\n2\nworld"), { status: "valid" });
		});

		test("should reject an index that follows text directly", () => {
			assert.deepStrictEqual(checkFormat("1\nhello\n2\nworld"), {
				status: "invalid-format",
				lineIndex: 2,
				context: ["   001: 1", "   002: hello", ">> 003: 2", "   004: world"],
			});
		});

		test("should accept single-line and empty text", () => {
			assert.deepStrictEqual(checkFormat("1"), { status: "valid" });
			assert.deepStrictEqual(checkFormat(""), { status: "valid" });
		});

		test("should accept CRLF output", () => {
			assert.deepStrictEqual(checkFormat("1\r\nhello\r\n\r\n2\r\nworld\r\n"), { status: "valid" });
		});
	});

	describe("checkSequentialNumbering", () => {
		test("should reject a gap", () => {
			assert.deepStrictEqual(checkSequentialNumbering("1\na\n\n2\nb\n\n4\nc"), {
				status: "invalid-sequence",
				expectedIndex: 3,
				foundIndex: 4,
			});
		});

		test("should accept 1, 2, 3", () => {
			assert.deepStrictEqual(checkSequentialNumbering("1\na\n\n2\nb\n\n3\nc"), { status: "valid" });
		});

		test("should read indices from full SRT text", () => {
			const srt = "1\n00:00:01,000 --> 00:00:02,000\nA\n\n2\n00:00:03,000 --> 00:00:04,000\nB\n\n2\n00:00:05,000 --> 00:00:06,000\nC";
			assert.deepStrictEqual(checkSequentialNumbering(srt), {
				status: "invalid-sequence",
				expectedIndex: 3,
				foundIndex: 2,
			});
		});

		test("should follow the source numbering when given", () => {
			assert.deepStrictEqual(checkSequentialNumbering("0\na\n\n1\nb", [0, 1]), { status: "valid" });
			assert.deepStrictEqual(checkSequentialNumbering("1\na\n\n2\nb\n\n2\nc", [1, 2, 2]), { status: "valid" });
			assert.deepStrictEqual(checkSequentialNumbering("1\na\n\n3\nb", [1, 3]), { status: "valid" });
			assert.deepStrictEqual(checkSequentialNumbering("1\na\n\n2\nb", [1, 3]), {
				status: "invalid-sequence",
				expectedIndex: 3,
				foundIndex: 2,
			});
		});

		test("should reject an index where the source had none", () => {
			const result = checkSequentialNumbering("1\na\n\n2\nb", [1, undefined]);
			assert.deepStrictEqual(result, { status: "invalid-sequence", expectedIndex: undefined, foundIndex: 2 });
			assert.strictEqual(describeValidationResult(result), "Expected a chunk without an index line but found 2");
		});

		test("should reject a chunk without an index line", () => {
			const result = checkSequentialNumbering("1\na\n\nb");
			assert.deepStrictEqual(result, { status: "invalid-sequence", expectedIndex: 2, foundIndex: undefined });
			assert.strictEqual(describeValidationResult(result), "Expected index 2 but the chunk has no index line");
		});
	});

	describe("validateTranslationResult", () => {
		test("should check the format before the order", () => {
			const result = validateTranslationResult("1\na\n3\nb");
			assert.strictEqual(result.status, "invalid-format");
		});

		test("should catch truncated output when a count is expected", () => {
			const result = validateTranslationResult("1\na\n\n2\nb", { expectedCount: 3 });
			assert.deepStrictEqual(result, { status: "invalid-count", expectedCount: 3, actualCount: 2 });
			assert.strictEqual(describeValidationResult(result), "Expected 3 entries but got 2");
		});

		test("should count against the source indices", () => {
			assert.deepStrictEqual(validateTranslationResult("0\na\n\n1\nb\n\n2\nc", { expectedIndices: [0, 1] }), {
				status: "invalid-count",
				expectedCount: 2,
				actualCount: 3,
			});
			assert.deepStrictEqual(validateTranslationResult("5\na\n\n5\nb\n", { expectedIndices: [5, 5] }), {
				status: "valid",
			});
		});

		test("should pass complete output", () => {
			assert.deepStrictEqual(validateTranslationResult("1\na\n\n2\nb\n", { expectedCount: 2 }), { status: "valid" });
		});
	});

	describe("describeValidationResult", () => {
		test("should name the offending line", () => {
			assert.strictEqual(
				describeValidationResult({ status: "invalid-format", lineIndex: 2, context: [] }),
				"Missing blank line before index on line 3"
			);
			assert.strictEqual(
				describeValidationResult({ status: "invalid-sequence", expectedIndex: 3, foundIndex: 4 }),
				"Expected index 3 but found 4"
			);
			assert.strictEqual(describeValidationResult({ status: "valid" }), "Translation result is valid");
		});
	});

	describe("filterBannerLines", () => {
		test("should remove the credentials banner", () => {
			assert.strictEqual(filterBannerLines("Loaded cached credentials.\r\n1\nHallo\n"), "1\nHallo");
		});

		test("should take custom banners", () => {
			assert.strictEqual(filterBannerLines("WARN: quota\n1\nHallo", ["WARN:"]), "1\nHallo");
		});
	});

	describe("analyzeTranslationFailure", () => {
		test("should describe a truncated tail and extra entries", () => {
			const analysis = analyzeTranslationFailure([1, 2, 3, 4, 5], [1, 2, 5, 6, undefined]);

			assert.deepStrictEqual(analysis.missingNumbers, [3, 4]);
			assert.deepStrictEqual(analysis.extraNumbers, [6]);
			assert.deepStrictEqual(analysis.sequenceGaps, [{ start: 3, end: 4 }]);
			assert.deepStrictEqual(analysis.insights, [
				"2 entries missing from translation",
				"Missing consecutive entries 3-4 - output was probably truncated or merged",
				"1 extra entries in translation - the translator may have split or invented cues",
				"1 chunks without an index line",
				"Translation goes beyond original range (6 > 5) - the translator may have continued generating",
			]);
		});

		test("should point out a single dropped entry", () => {
			assert.deepStrictEqual(analyzeTranslationFailure([1, 2, 3], [1, 3]).insights, [
				"1 entries missing from translation",
				"Only entry 2 is missing - likely a single dropped cue",
			]);
		});

		test("should report separate ranges", () => {
			const analysis = analyzeTranslationFailure([1, 2, 3, 4, 5], [1, 3, 5]);
			assert.deepStrictEqual(analysis.sequenceGaps, [
				{ start: 2, end: 2 },
				{ start: 4, end: 4 },
			]);
			assert.strictEqual(analysis.insights[1], "Missing entries in 2 separate ranges");
		});

		test("should have nothing to say about a complete translation", () => {
			assert.deepStrictEqual(analyzeTranslationFailure([1, 2], [1, 2]).insights, []);
		});
	});
});
