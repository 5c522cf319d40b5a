import { formatTimeRange, parseTimeRange, TIME_RANGE_PATTERN, type TimeValue } from "./time.ts";

export interface SubtitleBlock {
	index: number;
	start: TimeValue;
	end: TimeValue;
	/** Cue settings kept from the time line, written back after the range. */
	settings?: string;
	text: string;
}

export type ParseDiagnostic =
	| { kind: "fallback-index"; chunk: number; index: number; original: string }
	| { kind: "dropped-chunk"; chunk: number; preview: string }
	| { kind: "unparseable-timestamp"; chunk: number; value: string };

export interface ParseResult {
	blocks: SubtitleBlock[];
	diagnostics: ParseDiagnostic[];
}

/**
 * Per-parse state: the fallback index counter and the diagnostics collected
 * while reading. One session per file.
 */
export class ParseSession {
	private counter = 1;
	readonly diagnostics: ParseDiagnostic[] = [];

	nextFallback(): number {
		return this.counter;
	}

	blockParsed(): void {
		this.counter++;
	}

	report(diagnostic: ParseDiagnostic): void {
		this.diagnostics.push(diagnostic);
	}
}

export function normalizeNewlines(content: string): string {
	return content.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
}

/**
 * Splits text on the blank-line convention shared by SRT files and the
 * time/sentence streams.
 */
export function splitChunks(content: string): string[] {
	return normalizeNewlines(content)
		.trim()
		.split(/\n\s*\n/)
		.filter((chunk) => chunk.trim().length > 0);
}

function isIndexText(text: string): boolean {
	return /^\d+$/.test(text);
}

export function parseSRT(srtContent: string, session: ParseSession = new ParseSession()): ParseResult {
	const blocks: SubtitleBlock[] = [];
	const chunks = splitChunks(srtContent);

	chunks.forEach((chunk, chunkNumber) => {
		const trimmed = chunk.trim();
		if (!trimmed) return;
		const lines = trimmed.split("\n");

		const anchor = lines.findIndex((line) => TIME_RANGE_PATTERN.test(line));
		const range = anchor === -1 ? undefined : parseTimeRange(lines[anchor] ?? "");
		if (!range) {
			session.report({
				kind: "dropped-chunk",
				chunk: chunkNumber,
				preview: trimmed.substring(0, 50),
			});
			return;
		}

		const indexText = lines.slice(0, anchor).join("\n").trim();
		let index: number;
		if (isIndexText(indexText)) {
			index = parseInt(indexText, 10);
		} else {
			index = session.nextFallback();
			session.report({ kind: "fallback-index", chunk: chunkNumber, index, original: indexText });
		}

		for (const value of [range.start, range.end]) {
			if (value.kind === "raw") {
				session.report({ kind: "unparseable-timestamp", chunk: chunkNumber, value: value.text });
			}
		}

		blocks.push({
			index,
			...range,
			text: lines.slice(anchor + 1).join("\n").trim(),
		});
		session.blockParsed();
	});

	return { blocks, diagnostics: session.diagnostics };
}

export function parseSRTContent(srtContent: string): SubtitleBlock[] {
	return parseSRT(srtContent).blocks;
}

export function formatBlock(block: SubtitleBlock): string {
	return `${block.index}\n${formatTimeRange(block.start, block.end, block.settings)}\n${block.text}\n`;
}

export function formatSRT(blocks: readonly SubtitleBlock[]): string {
	return blocks.map(formatBlock).join("\n");
}

export function countSRTBlocks(srtContent: string): number {
	return parseSRTContent(srtContent).length;
}

export interface StreamEntry {
	/** Leading index line, when the chunk starts with one. */
	index: number | undefined;
	lines: string[];
}

/**
 * Reads a time or sentence stream. Unlike {@link parseSRT} no time anchor is
 * required: the first line is taken as the index when it is all digits.
 */
export function readStreamEntries(content: string): StreamEntry[] {
	return splitChunks(content).map((chunk) => {
		const lines = chunk.trim().split("\n");
		const first = (lines[0] ?? "").trim();
		if (isIndexText(first)) {
			return { index: parseInt(first, 10), lines: lines.slice(1) };
		}
		return { index: undefined, lines };
	});
}
