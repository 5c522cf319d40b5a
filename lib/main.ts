import { mergeStreams, type MergeDiagnostic, type MergeOptions } from "./merge.ts";
import { splitSRT, type SplitOptions } from "./split.ts";
import type { ParseDiagnostic } from "./srt.ts";
import { type TranslateOptions, type TranslationOutcome, translateSentenceStream } from "./translation.ts";

export type SRTTranslationResult =
	| {
			status: "merged";
			srt: string;
			outcome: TranslationOutcome;
			parseDiagnostics: ParseDiagnostic[];
			mergeDiagnostics: MergeDiagnostic[];
	  }
	| { status: "failed"; outcome: TranslationOutcome; parseDiagnostics: ParseDiagnostic[] };

/**
 * Whole pipeline for one SRT document held in memory: split, translate the
 * sentence stream, then merge it back onto the original timing.
 */
export async function translateSRTContent(
	srtContent: string,
	options: TranslateOptions & { split?: SplitOptions; merge?: MergeOptions }
): Promise<SRTTranslationResult> {
	const { logger } = options;
	const split = splitSRT(srtContent, options.split);

	logger.debug(
		{
			contentLength: srtContent.length,
			blocks: split.blocks.length,
			diagnostics: split.diagnostics.length,
		},
		"Parsed SRT into blocks"
	);

	const outcome = await translateSentenceStream(split.sentenceStream, options);
	if (outcome.status === "exhausted") {
		return { status: "failed", outcome, parseDiagnostics: split.diagnostics };
	}

	const merged = mergeStreams(split.timeStream, outcome.text, options.merge);

	logger.debug(
		{
			originalBlocks: split.blocks.length,
			mergedBlocks: merged.blocks.length,
			diagnostics: merged.diagnostics.length,
		},
		"SRT reconstruction completed"
	);

	return {
		status: "merged",
		srt: merged.srt,
		outcome,
		parseDiagnostics: split.diagnostics,
		mergeDiagnostics: merged.diagnostics,
	};
}
