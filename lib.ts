export {
	type CapCutExportResult,
	type CapCutProject,
	exportCapCutProject,
	extractCapCutBlocks,
	listCapCutProjects,
} from "./lib/capcut.ts";
export {
	type AppConfig,
	createConfig,
	createTranslator,
	loadInstructionBase,
	loadProjectProfile,
	parseProjectProfile,
	ProfileError,
	validateEnvironment,
} from "./lib/config.ts";
export { saveDebugData } from "./lib/debug.ts";
export { GeminiApiTranslator, GeminiCliTranslator } from "./lib/gemini.ts";
export { type LLMLogEntry, LLMLogger } from "./lib/llm-logger.ts";
export { FileLogWriter, type LogWriter } from "./lib/log-writer.ts";
export { createLogger } from "./lib/logger.ts";
export { type SRTTranslationResult, translateSRTContent } from "./lib/main.ts";
export {
	type MergeDiagnostic,
	type MergeOptions,
	type MergeResult,
	mergeStreams,
	splitProportionally,
} from "./lib/merge.ts";
export {
	BASE_PROMPT,
	type BooleanPolicy,
	booleanPolicy,
	buildInstructions,
	buildTranslationPrompt,
	type ChoicePolicy,
	choicePolicy,
	DEFAULT_POLICIES,
	PolicyError,
	type ProjectProfile,
	type PromptPolicy,
	resolvePolicySelection,
} from "./lib/prompt.ts";
export { LEGACY_HOUR_SHIFT, type ShiftRule, shiftBlocks, shiftSRT } from "./lib/shift.ts";
export { type SentenceEntry, type SplitResult, splitBlocks, splitSRT, type TimeEntry } from "./lib/split.ts";
export {
	countSRTBlocks,
	formatSRT,
	type ParseDiagnostic,
	type ParseResult,
	ParseSession,
	parseSRT,
	parseSRTContent,
	type SubtitleBlock,
} from "./lib/srt.ts";
export {
	formatTimestamp,
	parseTimestamp,
	shift,
	shiftTimestamp,
	type TimeRange,
	type Timestamp,
	type TimeValue,
} from "./lib/time.ts";
export {
	attemptTranslation,
	type AttemptResult,
	buildProfiles,
	MissingExecutableError,
	type TranslationOutcome,
	type TranslationProfile,
	translateSentenceStream,
	type Translator,
	TranslatorProcessError,
} from "./lib/translation.ts";
export {
	checkFormat,
	checkSequentialNumbering,
	filterBannerLines,
	type ValidationResult,
	validateTranslationResult,
} from "./lib/validation.ts";
export {
	backupFailedSource,
	type BatchReport,
	mergeDirectory,
	processDirectory,
	resolveLayout,
	shiftDirectory,
	splitDirectory,
	translateDirectory,
} from "./lib/workspace.ts";
