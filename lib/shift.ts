import { formatSRT, parseSRT, type ParseDiagnostic, type SubtitleBlock } from "./srt.ts";
import { shiftTimeValue } from "./time.ts";

export interface ShiftRule {
	/** First block index (the block's own number, not its position) to move. */
	startIndex: number;
	offsetSeconds: number;
}

/**
 * Undoes the one-hour offset some authoring tools add to every cue after
 * the first.
 */
export const LEGACY_HOUR_SHIFT: ShiftRule = { startIndex: 2, offsetSeconds: -3600 };

export function shiftBlocks(
	blocks: readonly SubtitleBlock[],
	startIndex: number,
	offsetSeconds: number,
): SubtitleBlock[] {
	return blocks.map((block) => {
		if (block.index < startIndex) return block;
		return {
			...block,
			start: shiftTimeValue(block.start, offsetSeconds),
			end: shiftTimeValue(block.end, offsetSeconds),
		};
	});
}

export function shiftSRT(
	srtContent: string,
	startIndex: number,
	offsetSeconds: number,
): { srt: string; blocks: SubtitleBlock[]; diagnostics: ParseDiagnostic[] } {
	const { blocks, diagnostics } = parseSRT(srtContent);
	const shifted = shiftBlocks(blocks, startIndex, offsetSeconds);
	return { srt: formatSRT(shifted), blocks: shifted, diagnostics };
}
