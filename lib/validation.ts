import { normalizeNewlines, parseSRT, readStreamEntries } from "./srt.ts";
import { TIME_RANGE_PATTERN } from "./time.ts";

export type ValidationResult =
	| { status: "valid" }
	| { status: "invalid-format"; lineIndex: number; context: string[] }
	| { status: "invalid-sequence"; expectedIndex: number | undefined; foundIndex: number | undefined }
	| { status: "invalid-count"; expectedCount: number; actualCount: number };

/** Noise lines the Gemini CLI prints on stdout before the actual answer. */
export const DEFAULT_BANNERS: readonly string[] = ["Loaded cached credentials."];

const CONTEXT_RADIUS = 5;

export function filterBannerLines(text: string, banners: readonly string[] = DEFAULT_BANNERS): string {
	return normalizeNewlines(text)
		.trim()
		.split("\n")
		.filter((line) => !banners.some((banner) => line.includes(banner)))
		.join("\n");
}

export function formatErrorContext(lines: readonly string[], lineIndex: number): string[] {
	const start = Math.max(0, lineIndex - CONTEXT_RADIUS);
	const end = Math.min(lines.length, lineIndex + CONTEXT_RADIUS + 1);
	const context: string[] = [];

	for (let i = start; i < end; i++) {
		const marker = i === lineIndex ? ">> " : "   ";
		context.push(`${marker}${String(i + 1).padStart(3, "0")}: ${lines[i] ?? ""}`);
	}

	return context;
}

/**
 * Every index line (all digits) after the first line must follow a blank
 * line, otherwise the chunk boundaries the merger relies on are lost.
 */
export function checkFormat(text: string): ValidationResult {
	const lines = normalizeNewlines(text).trim().split("\n");
	if (lines.length <= 1) return { status: "valid" };

	for (let i = 1; i < lines.length; i++) {
		const current = (lines[i] ?? "").trim();
		const previous = (lines[i - 1] ?? "").trim();
		if (/^\d+$/.test(current) && previous !== "") {
			return {
				status: "invalid-format",
				lineIndex: i,
				context: formatErrorContext(lines, i),
			};
		}
	}

	return { status: "valid" };
}

export function readIndices(text: string): (number | undefined)[] {
	if (TIME_RANGE_PATTERN.test(text)) {
		return parseSRT(text).blocks.map((block) => block.index);
	}
	return readStreamEntries(text).map((entry) => entry.index);
}

/**
 * Walks the indices of `text`. Without `expectedIndices` they must run 1, 2,
 * 3, ... Otherwise each must repeat the source index at the same position,
 * so sources numbered from 0, with gaps or with duplicates still pass when
 * the output echoes them.
 */
export function checkSequentialNumbering(
	text: string,
	expectedIndices?: readonly (number | undefined)[]
): ValidationResult {
	for (const [i, index] of readIndices(text).entries()) {
		// Extra entries are left to the count check.
		if (expectedIndices && i >= expectedIndices.length) break;

		const expectedIndex = expectedIndices ? expectedIndices[i] : i + 1;
		if (index !== expectedIndex) {
			return { status: "invalid-sequence", expectedIndex, foundIndex: index };
		}
	}

	return { status: "valid" };
}

export interface ValidationOptions {
	/** When set, the result must hold exactly this many entries. */
	expectedCount?: number;
	/**
	 * Index sequence of the source stream. When set, the result must repeat
	 * it and hold as many entries, unless `expectedCount` says otherwise.
	 */
	expectedIndices?: readonly (number | undefined)[];
}

export function validateTranslationResult(text: string, options: ValidationOptions = {}): ValidationResult {
	const format = checkFormat(text);
	if (format.status !== "valid") return format;

	const sequence = checkSequentialNumbering(text, options.expectedIndices);
	if (sequence.status !== "valid") return sequence;

	const expectedCount = options.expectedCount ?? options.expectedIndices?.length;
	if (expectedCount !== undefined) {
		const actualCount = readIndices(text).length;
		if (actualCount !== expectedCount) {
			return { status: "invalid-count", expectedCount, actualCount };
		}
	}

	return { status: "valid" };
}

export function describeValidationResult(result: ValidationResult): string {
	switch (result.status) {
		case "valid":
			return "Translation result is valid";
		case "invalid-format":
			return `Missing blank line before index on line ${result.lineIndex + 1}`;
		case "invalid-sequence":
			if (result.expectedIndex === undefined) {
				return `Expected a chunk without an index line but found ${result.foundIndex}`;
			}
			return result.foundIndex === undefined
				? `Expected index ${result.expectedIndex} but the chunk has no index line`
				: `Expected index ${result.expectedIndex} but found ${result.foundIndex}`;
		case "invalid-count":
			return `Expected ${result.expectedCount} entries but got ${result.actualCount}`;
	}
}

export function analyzeTranslationFailure(
	sourceIndices: readonly number[],
	translatedIndices: readonly (number | undefined)[],
): {
	missingNumbers: number[];
	extraNumbers: number[];
	sequenceGaps: { start: number; end: number }[];
	insights: string[];
} {
	const originalNumbers = new Set(sourceIndices);
	const translatedNumbers = new Set(
		translatedIndices.filter((n): n is number => n !== undefined),
	);

	const missingNumbers = [...originalNumbers]
		.filter((n) => !translatedNumbers.has(n))
		.sort((a, b) => a - b);
	const extraNumbers = [...translatedNumbers]
		.filter((n) => !originalNumbers.has(n))
		.sort((a, b) => a - b);

	const sequenceGaps: { start: number; end: number }[] = [];
	for (const current of missingNumbers) {
		const last = sequenceGaps[sequenceGaps.length - 1];
		if (last && current === last.end + 1) {
			last.end = current;
		} else {
			sequenceGaps.push({ start: current, end: current });
		}
	}

	const insights: string[] = [];

	if (missingNumbers.length > 0) {
		insights.push(`${missingNumbers.length} entries missing from translation`);

		const [firstGap] = sequenceGaps;
		if (sequenceGaps.length === 1 && firstGap && firstGap.start === firstGap.end) {
			insights.push(`Only entry ${firstGap.start} is missing - likely a single dropped cue`);
		} else if (sequenceGaps.length === 1 && firstGap) {
			insights.push(
				`Missing consecutive entries ${firstGap.start}-${firstGap.end} - output was probably truncated or merged`,
			);
		} else {
			insights.push(`Missing entries in ${sequenceGaps.length} separate ranges`);
		}
	}

	if (extraNumbers.length > 0) {
		insights.push(
			`${extraNumbers.length} extra entries in translation - the translator may have split or invented cues`,
		);
	}

	const unnumbered = translatedIndices.length - translatedIndices.filter((n) => n !== undefined).length;
	if (unnumbered > 0) {
		insights.push(`${unnumbered} chunks without an index line`);
	}

	if (sourceIndices.length > 0 && translatedNumbers.size > 0) {
		const maxOriginal = Math.max(...sourceIndices);
		const maxTranslated = Math.max(...translatedNumbers);
		if (maxTranslated > maxOriginal) {
			insights.push(
				`Translation goes beyond original range (${maxTranslated} > ${maxOriginal}) - the translator may have continued generating`,
			);
		}
	}

	return { missingNumbers, extraNumbers, sequenceGaps, insights };
}
