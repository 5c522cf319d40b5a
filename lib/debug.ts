import path from "node:path";
import type pino from "pino";
import type { LogWriter } from "./log-writer.ts";
import { readStreamEntries } from "./srt.ts";
import { analyzeTranslationFailure, readIndices, type ValidationResult } from "./validation.ts";

export interface TranslationFailureData {
	file?: string;
	profile: string;
	sourceContent: string;
	rawOutput: string;
	validation: ValidationResult;
}

/**
 * Dump name for one rejected output: the time, then the source file and
 * profile when known, so two files rejected in the same millisecond never
 * share a dump.
 */
export function debugFileName(now: Date = new Date(), file?: string, profile?: string): string {
	const parts = [now.toISOString().replace(/[:.]/g, "-")];
	for (const part of [file === undefined ? undefined : path.parse(file).name, profile]) {
		const safe = (part ?? "").replace(/[^\p{L}\p{N}_-]+/gu, "_");
		if (safe) parts.push(safe);
	}
	return `translation-failure-${parts.join("-")}.json`;
}

/**
 * Dumps a rejected translation so the prompt can be tuned later. Failing to
 * write the dump never fails the translation itself.
 */
export async function saveDebugData(
	writer: LogWriter,
	data: TranslationFailureData,
	logger: pino.Logger,
	now: Date = new Date()
): Promise<string | undefined> {
	try {
		const sourceIndices = readStreamEntries(data.sourceContent)
			.map((entry) => entry.index)
			.filter((index): index is number => index !== undefined);
		const translatedIndices = readIndices(data.rawOutput);
		const fileName = debugFileName(now, data.file, data.profile);

		const debugData = {
			timestamp: now.toISOString(),
			...data,
			analysis: {
				sourceCount: sourceIndices.length,
				translatedCount: translatedIndices.length,
				...analyzeTranslationFailure(sourceIndices, translatedIndices),
			},
		};

		await writer.write(fileName, JSON.stringify(debugData, null, 2));

		logger.info({ debugFile: fileName }, "Debug data saved for translation failure analysis");
		return fileName;
	} catch (error) {
		logger.warn(
			{ error: error instanceof Error ? error.message : String(error) },
			"Failed to save debug data"
		);
		return undefined;
	}
}
