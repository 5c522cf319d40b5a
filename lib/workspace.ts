import { constants, existsSync } from "node:fs";
import { copyFile, mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type pino from "pino";
import { mergeStreams, type MergeOptions, type MergeResult } from "./merge.ts";
import { shiftSRT } from "./shift.ts";
import { splitSRT, type SplitOptions, type SplitResult } from "./split.ts";
import { type TranslateOptions, type TranslationOutcome, translateSentenceStream } from "./translation.ts";

export const TIME_DIR_NAME = "txtWithTime";
export const SENTENCE_DIR_NAME = "txtWithSentence";
export const OUTPUT_DIR_NAME = "updatedSrt";
export const FAILED_DIR_NAME = "failed_srt";

export interface WorkspaceLayout {
	baseDir: string;
	timeDir: string;
	sentenceDir: string;
	outputDir: string;
	failedDir: string;
}

export function resolveLayout(baseDir: string): WorkspaceLayout {
	return {
		baseDir,
		timeDir: path.join(baseDir, TIME_DIR_NAME),
		sentenceDir: path.join(baseDir, SENTENCE_DIR_NAME),
		outputDir: path.join(baseDir, OUTPUT_DIR_NAME),
		failedDir: path.join(baseDir, FAILED_DIR_NAME),
	};
}

export function baseName(filePath: string): string {
	return path.basename(filePath, path.extname(filePath));
}

export function streamFileName(srtPath: string): string {
	return `${baseName(srtPath)}.txt`;
}

export function outputFileName(name: string): string {
	return `${baseName(name)}_updated.srt`;
}

export function shiftedFileName(srtPath: string): string {
	const ext = path.extname(srtPath);
	return `${path.basename(srtPath, ext)}_shifted${ext}`;
}

async function listFiles(dir: string, extension: string): Promise<string[]> {
	const entries = await readdir(dir, { withFileTypes: true });
	return entries
		.filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(extension))
		.map((entry) => entry.name)
		.sort();
}

export function listSrtFiles(dir: string): Promise<string[]> {
	return listFiles(dir, ".srt");
}

export async function splitFile(
	srtPath: string,
	layout: WorkspaceLayout,
	options: SplitOptions & { logger: pino.Logger }
): Promise<SplitResult & { timePath: string; sentencePath: string }> {
	options.logger.debug({ file: path.basename(srtPath) }, "Splitting subtitles file");

	const content = await readFile(srtPath, "utf8");
	const result = splitSRT(content, options.shift ? { shift: options.shift } : {});

	for (const diagnostic of result.diagnostics) {
		options.logger.debug({ file: path.basename(srtPath), ...diagnostic }, "Parse diagnostic");
	}

	await mkdir(layout.timeDir, { recursive: true });
	await mkdir(layout.sentenceDir, { recursive: true });

	const timePath = path.join(layout.timeDir, streamFileName(srtPath));
	const sentencePath = path.join(layout.sentenceDir, streamFileName(srtPath));
	await writeFile(timePath, result.timeStream, "utf8");
	await writeFile(sentencePath, result.sentenceStream, "utf8");

	return { ...result, timePath, sentencePath };
}

/**
 * Translates a sentence file in place. The file is only rewritten when the
 * translation passed validation.
 */
export async function translateFile(
	sentencePath: string,
	options: Omit<TranslateOptions, "file">
): Promise<TranslationOutcome> {
	const file = path.basename(sentencePath);
	const content = await readFile(sentencePath, "utf8");
	const outcome = await translateSentenceStream(content, { ...options, file });

	if (outcome.status === "validated" && outcome.profile) {
		await writeFile(sentencePath, outcome.text, "utf8");
	}

	return outcome;
}

export async function mergeFile(
	timePath: string,
	sentencePath: string,
	outputPath: string,
	options: MergeOptions & { logger: pino.Logger }
): Promise<MergeResult> {
	const file = path.basename(outputPath);
	if (!existsSync(timePath) || !existsSync(sentencePath)) {
		throw new Error(`Time or sentence file missing for ${file}`);
	}

	const timeStream = await readFile(timePath, "utf8");
	const sentenceStream = await readFile(sentencePath, "utf8");
	const result = mergeStreams(
		timeStream,
		sentenceStream,
		options.splitMultiLine === undefined ? {} : { splitMultiLine: options.splitMultiLine }
	);

	for (const diagnostic of result.diagnostics) {
		const level = diagnostic.kind === "split-fallback" || diagnostic.kind === "length-mismatch" ? "warn" : "debug";
		options.logger[level]({ file, ...diagnostic }, "Merge diagnostic");
	}

	await mkdir(path.dirname(outputPath), { recursive: true });
	await writeFile(outputPath, result.srt, "utf8");
	return result;
}

export async function shiftFile(
	srtPath: string,
	startIndex: number,
	offsetSeconds: number,
	logger: pino.Logger
): Promise<string> {
	const content = await readFile(srtPath, "utf8");
	const { srt, blocks } = shiftSRT(content, startIndex, offsetSeconds);
	const outputPath = path.join(path.dirname(srtPath), shiftedFileName(srtPath));
	await writeFile(outputPath, srt, "utf8");
	logger.debug({ file: path.basename(srtPath), blocks: blocks.length, outputPath }, "Shifted subtitles file");
	return outputPath;
}

export type BackupResult = "copied" | "exists" | "missing" | "error";

/**
 * Copies a source file that could not be processed into the quarantine
 * directory. An existing copy is never overwritten.
 */
export async function backupFailedSource(
	srtPath: string,
	failedDir: string,
	logger: pino.Logger
): Promise<BackupResult> {
	if (!existsSync(srtPath)) return "missing";

	const backupPath = path.join(failedDir, path.basename(srtPath));
	try {
		await mkdir(failedDir, { recursive: true });
		await copyFile(srtPath, backupPath, constants.COPYFILE_EXCL);
		logger.warn({ file: path.basename(srtPath), backupPath }, `🗄  Backed up failed source to '${FAILED_DIR_NAME}'`);
		return "copied";
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "EEXIST") {
			return "exists";
		}
		logger.error(
			{ file: path.basename(srtPath), error: error instanceof Error ? error.message : String(error) },
			"❌ Failed to back up source file"
		);
		return "error";
	}
}

export interface BatchOptions {
	concurrency?: number;
	signal?: AbortSignal;
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. A failing
 * item never stops the rest; results keep the order of `items`.
 */
export async function runBatch<T, R>(
	items: readonly T[],
	worker: (item: T, position: number) => Promise<R>,
	options: BatchOptions = {}
): Promise<PromiseSettledResult<R>[]> {
	const results: PromiseSettledResult<R>[] = [];
	const queue = items.entries();
	const workerCount = Math.max(1, Math.min(options.concurrency ?? 1, items.length));

	const run = async () => {
		for (const [position, item] of queue) {
			if (options.signal?.aborted) break;
			try {
				results[position] = { status: "fulfilled", value: await worker(item, position) };
			} catch (error) {
				results[position] = { status: "rejected", reason: error };
			}
		}
	};

	await Promise.all(Array.from({ length: workerCount }, run));

	return items.map(
		(_, position) => results[position] ?? { status: "rejected", reason: new Error("Batch was cancelled") }
	);
}

export type FileStage = "split" | "translate" | "merge" | "shift";

export type PipelineState = "unparsed" | "parsed" | "split" | "translated" | "validated" | "merged" | "failed";

export interface FileReport {
	file: string;
	state: PipelineState;
	stage?: FileStage;
	reason?: string;
	outputPath?: string;
}

export interface BatchReport {
	total: number;
	succeeded: FileReport[];
	failed: FileReport[];
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function toReport(
	files: readonly string[],
	settled: PromiseSettledResult<FileReport>[],
	stage: FileStage
): BatchReport {
	const reports = settled.map((result, i): FileReport => {
		if (result.status === "fulfilled") return result.value;
		return { file: files[i] ?? "", state: "failed", stage, reason: errorMessage(result.reason) };
	});

	return {
		total: files.length,
		succeeded: reports.filter((report) => report.state !== "failed"),
		failed: reports.filter((report) => report.state === "failed"),
	};
}

interface DirectoryOptions extends BatchOptions {
	logger: pino.Logger;
}

async function quarantine(layout: WorkspaceLayout, srtName: string, logger: pino.Logger): Promise<void> {
	await backupFailedSource(path.join(layout.baseDir, srtName), layout.failedDir, logger);
}

function logSummary(logger: pino.Logger, action: string, report: BatchReport): void {
	logger.info(
		{ total: report.total, succeeded: report.succeeded.length, failed: report.failed.map((f) => f.file) },
		`✅ ${action}: ${report.succeeded.length}/${report.total} files`
	);
}

export async function splitDirectory(
	dir: string,
	options: DirectoryOptions & SplitOptions
): Promise<BatchReport> {
	const { logger } = options;
	const layout = resolveLayout(dir);
	const files = await listSrtFiles(dir);
	logger.info({ dir, files: files.length }, "✂️  Splitting subtitles files");

	const settled = await runBatch(
		files,
		async (file): Promise<FileReport> => {
			try {
				const result = await splitFile(path.join(dir, file), layout, {
					logger,
					...(options.shift && { shift: options.shift }),
				});
				return { file, state: "split", outputPath: result.sentencePath };
			} catch (error) {
				logger.error({ file, error: errorMessage(error) }, "❌ Split failed");
				await quarantine(layout, file, logger);
				return { file, state: "failed", stage: "split", reason: errorMessage(error) };
			}
		},
		options
	);

	const report = toReport(files, settled, "split");
	logSummary(logger, "Split finished", report);
	return report;
}

export async function translateDirectory(
	dir: string,
	options: BatchOptions & Omit<TranslateOptions, "file">
): Promise<BatchReport> {
	const { logger } = options;
	const layout = resolveLayout(dir);
	const files = await listFiles(layout.sentenceDir, ".txt");
	logger.info({ dir: layout.sentenceDir, files: files.length }, "🌐 Translating sentence files");

	const settled = await runBatch(
		files,
		async (file): Promise<FileReport> => {
			const srtName = `${baseName(file)}.srt`;
			try {
				const outcome = await translateFile(path.join(layout.sentenceDir, file), options);
				if (outcome.status === "validated") {
					return { file, state: "validated" };
				}
				logger.error({ file, reason: outcome.reason }, "❌ Translation failed");
				await quarantine(layout, srtName, logger);
				return { file, state: "failed", stage: "translate", reason: outcome.reason };
			} catch (error) {
				logger.error({ file, error: errorMessage(error) }, "❌ Translation failed");
				await quarantine(layout, srtName, logger);
				return { file, state: "failed", stage: "translate", reason: errorMessage(error) };
			}
		},
		options
	);

	const report = toReport(files, settled, "translate");
	logSummary(logger, "Translation finished", report);
	return report;
}

export async function mergeDirectory(
	dir: string,
	options: DirectoryOptions & MergeOptions
): Promise<BatchReport> {
	const { logger } = options;
	const layout = resolveLayout(dir);
	const files = await listFiles(layout.sentenceDir, ".txt");
	logger.info({ dir, files: files.length }, "🧩 Merging time and sentence files");

	const settled = await runBatch(
		files,
		async (file): Promise<FileReport> => {
			const outputPath = path.join(layout.outputDir, outputFileName(file));
			try {
				await mergeFile(path.join(layout.timeDir, file), path.join(layout.sentenceDir, file), outputPath, {
					logger,
					...(options.splitMultiLine !== undefined && { splitMultiLine: options.splitMultiLine }),
				});
				return { file, state: "merged", outputPath };
			} catch (error) {
				logger.error({ file, error: errorMessage(error) }, "❌ Merge failed");
				await quarantine(layout, `${baseName(file)}.srt`, logger);
				return { file, state: "failed", stage: "merge", reason: errorMessage(error) };
			}
		},
		options
	);

	const report = toReport(files, settled, "merge");
	logSummary(logger, "Merge finished", report);
	return report;
}

export async function shiftDirectory(
	dir: string,
	startIndex: number,
	offsetSeconds: number,
	options: DirectoryOptions
): Promise<BatchReport> {
	const { logger } = options;
	const layout = resolveLayout(dir);
	// Skip earlier results so a second run does not shift them again.
	const files = (await listSrtFiles(dir)).filter((file) => !baseName(file).endsWith("_shifted"));
	logger.info({ dir, files: files.length, startIndex, offsetSeconds }, "⏱  Shifting subtitles timing");

	const settled = await runBatch(
		files,
		async (file): Promise<FileReport> => {
			try {
				const outputPath = await shiftFile(path.join(dir, file), startIndex, offsetSeconds, logger);
				return { file, state: "parsed", outputPath };
			} catch (error) {
				logger.error({ file, error: errorMessage(error) }, "❌ Shift failed");
				await quarantine(layout, file, logger);
				return { file, state: "failed", stage: "shift", reason: errorMessage(error) };
			}
		},
		options
	);

	const report = toReport(files, settled, "shift");
	logSummary(logger, "Shift finished", report);
	return report;
}

export interface ProcessOptions extends BatchOptions, Omit<TranslateOptions, "file"> {
	split?: SplitOptions;
	merge?: MergeOptions;
	onFileState?: (file: string, state: PipelineState) => void;
}

/**
 * One-click workflow: split, translate and merge each file in turn. A
 * failure at any stage quarantines that file's source and moves on.
 */
export async function processDirectory(dir: string, options: ProcessOptions): Promise<BatchReport> {
	const { logger } = options;
	const layout = resolveLayout(dir);
	const files = await listSrtFiles(dir);
	await mkdir(layout.outputDir, { recursive: true });
	logger.info({ dir, files: files.length }, "🚀 Starting split, translate and merge");

	const settled = await runBatch(
		files,
		async (file, position): Promise<FileReport> => {
			const setState = (state: PipelineState) => options.onFileState?.(file, state);
			const fail = async (stage: FileStage, reason: string): Promise<FileReport> => {
				logger.error({ file, stage, reason }, `❌ '${file}' failed at ${stage}`);
				setState("failed");
				await quarantine(layout, file, logger);
				return { file, state: "failed", stage, reason };
			};

			logger.info(`[${position + 1}/${files.length}] '${file}'`);
			setState("unparsed");

			let split: Awaited<ReturnType<typeof splitFile>>;
			try {
				split = await splitFile(path.join(dir, file), layout, { logger, ...options.split });
			} catch (error) {
				return fail("split", errorMessage(error));
			}
			setState("parsed");
			setState("split");

			let outcome: TranslationOutcome;
			try {
				outcome = await translateFile(split.sentencePath, options);
			} catch (error) {
				return fail("translate", errorMessage(error));
			}
			if (outcome.status === "exhausted") {
				return fail("translate", outcome.reason);
			}
			setState("translated");
			setState("validated");

			const outputPath = path.join(layout.outputDir, outputFileName(file));
			try {
				await mergeFile(split.timePath, split.sentencePath, outputPath, { logger, ...options.merge });
			} catch (error) {
				return fail("merge", errorMessage(error));
			}
			setState("merged");
			logger.info({ file, outputPath }, `✅ '${file}' done`);
			return { file, state: "merged", outputPath };
		},
		options
	);

	const report = toReport(files, settled, "translate");
	logSummary(logger, "All done", report);
	return report;
}
