import { shiftBlocks, type ShiftRule } from "./shift.ts";
import { parseSRT, type ParseDiagnostic, type SubtitleBlock } from "./srt.ts";
import { formatTimeRange } from "./time.ts";

export interface TimeEntry {
	index: number;
	timeRange: string;
}

export interface SentenceEntry {
	index: number;
	text: string;
}

export interface SplitOptions {
	shift?: ShiftRule;
}

export interface SplitResult {
	timeEntries: TimeEntry[];
	sentenceEntries: SentenceEntry[];
	timeStream: string;
	sentenceStream: string;
}

function serializeEntry(index: number, payload: string): string {
	return `${index}\n${payload}\n\n`;
}

export function serializeTimeStream(entries: readonly TimeEntry[]): string {
	return entries.map((entry) => serializeEntry(entry.index, entry.timeRange)).join("");
}

export function serializeSentenceStream(entries: readonly SentenceEntry[]): string {
	return entries.map((entry) => serializeEntry(entry.index, entry.text)).join("");
}

export function splitBlocks(blocks: readonly SubtitleBlock[], options: SplitOptions = {}): SplitResult {
	const source = options.shift
		? shiftBlocks(blocks, options.shift.startIndex, options.shift.offsetSeconds)
		: blocks;

	const timeEntries = source.map((block) => ({
		index: block.index,
		timeRange: formatTimeRange(block.start, block.end, block.settings),
	}));
	const sentenceEntries = source.map((block) => ({
		index: block.index,
		text: block.text,
	}));

	return {
		timeEntries,
		sentenceEntries,
		timeStream: serializeTimeStream(timeEntries),
		sentenceStream: serializeSentenceStream(sentenceEntries),
	};
}

export function splitSRT(
	srtContent: string,
	options: SplitOptions = {},
): SplitResult & { blocks: SubtitleBlock[]; diagnostics: ParseDiagnostic[] } {
	const { blocks, diagnostics } = parseSRT(srtContent);
	return { ...splitBlocks(blocks, options), blocks, diagnostics };
}
