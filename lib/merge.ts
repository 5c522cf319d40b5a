import { formatSRT, splitChunks, type SubtitleBlock } from "./srt.ts";
import { parseTimeRange, type TimeRange, timeValueToMs } from "./time.ts";

export interface MergeOptions {
	/**
	 * Turn a multi-line sentence entry into one cue per line, dividing the
	 * time range by line length. Defaults to true.
	 */
	splitMultiLine?: boolean;
}

export type MergeDiagnostic =
	| { kind: "length-mismatch"; timeChunks: number; sentenceChunks: number }
	| { kind: "skipped-time-chunk"; position: number }
	| { kind: "dropped-empty"; position: number; index: string }
	| { kind: "split-fallback"; position: number; index: string; reason: string };

export interface MergeResult {
	srt: string;
	blocks: SubtitleBlock[];
	diagnostics: MergeDiagnostic[];
}

function textLength(line: string): number {
	return Array.from(line).length;
}

function rangeValues(timeLine: string): TimeRange {
	const parsed = parseTimeRange(timeLine);
	if (parsed) return parsed;

	const [start = "", end = ""] = timeLine.split("-->").map((part) => part.trim());
	return { start: { kind: "raw", text: start }, end: { kind: "raw", text: end } };
}

export function sentenceLines(sentenceChunk: string, originalIndex: string): string[] {
	const lines = sentenceChunk.trim().split("\n");
	const first = (lines[0] ?? "").trim();
	// The translator sometimes echoes the index back into the text body.
	const body = /^\d+$/.test(first) && first === originalIndex ? lines.slice(1) : lines;
	return body.filter((line) => line.trim().length > 0);
}

/**
 * Divides `timeLine` across `lines` in proportion to their length. The last
 * line always ends exactly on the original end time.
 */
export function splitProportionally(
	timeLine: string,
	lines: readonly string[]
): (TimeRange & { text: string })[] {
	const range = parseTimeRange(timeLine);
	if (!range) {
		throw new Error(`Invalid time range: "${timeLine}"`);
	}

	const startMs = timeValueToMs(range.start);
	const endMs = timeValueToMs(range.end);
	const duration = endMs - startMs;
	if (duration < 0) {
		throw new Error(`Time range ends before it starts: "${timeLine}"`);
	}

	const totalLength = lines.reduce((sum, line) => sum + textLength(line), 0);
	if (totalLength === 0) {
		throw new Error("Cannot weight lines with zero total length");
	}

	const separator = range.start.kind === "time" ? range.start.separator : ",";
	const parts: (TimeRange & { text: string })[] = [];
	let cursor = startMs;

	lines.forEach((line, i) => {
		const isLast = i === lines.length - 1;
		const lineEnd = isLast ? endMs : cursor + Math.round((textLength(line) / totalLength) * duration);
		parts.push({
			start: { kind: "time", ms: cursor, separator },
			end: { kind: "time", ms: lineEnd, separator },
			...(range.settings !== undefined && { settings: range.settings }),
			text: line,
		});
		cursor = lineEnd;
	});

	return parts;
}

export function mergeStreams(
	timeStream: string,
	sentenceStream: string,
	options: MergeOptions = {}
): MergeResult {
	const splitMultiLine = options.splitMultiLine ?? true;
	const timeChunks = splitChunks(timeStream);
	const sentenceChunks = splitChunks(sentenceStream);
	const diagnostics: MergeDiagnostic[] = [];

	if (timeChunks.length !== sentenceChunks.length) {
		diagnostics.push({
			kind: "length-mismatch",
			timeChunks: timeChunks.length,
			sentenceChunks: sentenceChunks.length,
		});
	}

	const blocks: SubtitleBlock[] = [];
	const pairs = Math.min(timeChunks.length, sentenceChunks.length);

	for (let position = 0; position < pairs; position++) {
		const timeLines = (timeChunks[position] ?? "").trim().split("\n");
		const originalIndex = (timeLines[0] ?? "").trim();
		const timeLine = (timeLines[1] ?? "").trim();
		if (timeLines.length < 2) {
			diagnostics.push({ kind: "skipped-time-chunk", position });
			continue;
		}

		const lines = sentenceLines(sentenceChunks[position] ?? "", originalIndex);
		if (lines.length === 0) {
			diagnostics.push({ kind: "dropped-empty", position, index: originalIndex });
			continue;
		}

		if (lines.length === 1 || !splitMultiLine) {
			blocks.push({ index: blocks.length + 1, ...rangeValues(timeLine), text: lines.join("\n") });
			continue;
		}

		try {
			for (const part of splitProportionally(timeLine, lines)) {
				blocks.push({ index: blocks.length + 1, ...part });
			}
		} catch (error) {
			diagnostics.push({
				kind: "split-fallback",
				position,
				index: originalIndex,
				reason: error instanceof Error ? error.message : String(error),
			});
			blocks.push({ index: blocks.length + 1, ...rangeValues(timeLine), text: lines.join("\n") });
		}
	}

	return { srt: formatSRT(blocks), blocks, diagnostics };
}
