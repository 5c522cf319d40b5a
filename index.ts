import path from "node:path";
import { pathToFileURL } from "node:url";
import type pino from "pino";
import type { Argv } from "yargs";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { exportCapCutProject, listCapCutProjects } from "./lib/capcut.ts";
import {
	type AppConfig,
	createConfig,
	createTranslator,
	loadInstructionBase,
	loadProjectProfile,
	parseTranslatorKind,
	requiredEnvironment,
	validateEnvironment,
} from "./lib/config.ts";
import { LLMLogger } from "./lib/llm-logger.ts";
import { FileLogWriter } from "./lib/log-writer.ts";
import { createLogger } from "./lib/logger.ts";
import { buildInstructions, DEFAULT_POLICIES, EMPTY_PROFILE, resolvePolicySelection } from "./lib/prompt.ts";
import { LEGACY_HOUR_SHIFT } from "./lib/shift.ts";
import { buildProfiles, type TranslateOptions } from "./lib/translation.ts";
import {
	type BatchReport,
	mergeDirectory,
	processDirectory,
	shiftDirectory,
	splitDirectory,
	translateDirectory,
} from "./lib/workspace.ts";

const logger = createLogger();

const translationOptions = {
	translator: {
		type: "string",
		choices: ["cli", "api"],
		default: "cli",
		description: "Use the gemini command-line program or the Gemini API",
	},
	model: {
		alias: "m",
		type: "string",
		description: "Primary model",
	},
	"fallback-model": {
		type: "array",
		string: true,
		description: "Models to retry with, in order, when the primary fails",
	},
	timeout: {
		type: "number",
		description: "Seconds to wait for one translator call",
	},
	"target-language": {
		alias: "t",
		type: "string",
		default: "Korean",
		description: "Language to translate into",
	},
	"prompt-file": {
		type: "string",
		description: "Text file holding the base instructions",
	},
	profile: {
		type: "string",
		description: "JSON project profile with character names and glossary",
	},
	policy: {
		type: "array",
		string: true,
		description: "Prompt policy override, key=value (repeatable)",
	},
} as const;

const batchOptions = {
	concurrency: {
		alias: "c",
		type: "number",
		default: 1,
		description: "Files processed at the same time",
	},
} as const;

const mergeOptions = {
	"split-multi-line": {
		type: "boolean",
		default: true,
		description: "Give each line of a multi-line entry its own cue, timed by line length",
	},
} as const;

const splitOptions = {
	"shift-hour": {
		type: "boolean",
		default: false,
		description: "Subtract one hour from every cue from number 2 onward while splitting",
	},
} as const;

function withDirectory<T>(y: Argv<T>) {
	return y.positional("dir", {
		type: "string",
		demandOption: true,
		description: "Folder holding the .srt files",
	});
}

function withTranslation<T>(y: Argv<T>) {
	return y.options(translationOptions).options(batchOptions);
}

interface TranslationArgs {
	translator: string;
	model: string | undefined;
	fallbackModel: string[] | undefined;
	timeout: number | undefined;
	targetLanguage: string;
	promptFile: string | undefined;
	profile: string | undefined;
	policy: string[] | undefined;
	concurrency: number;
}

function configFromArgs(args: TranslationArgs, splitMultiLine?: boolean): AppConfig {
	return createConfig({
		translator: parseTranslatorKind(args.translator),
		...(args.model !== undefined && { model: args.model }),
		...(args.fallbackModel !== undefined && { fallbackModel: args.fallbackModel }),
		...(args.timeout !== undefined && { timeout: args.timeout }),
		targetLanguage: args.targetLanguage,
		...(args.promptFile !== undefined && { promptFile: args.promptFile }),
		...(args.profile !== undefined && { profile: args.profile }),
		...(args.policy !== undefined && { policy: args.policy }),
		concurrency: args.concurrency,
		...(splitMultiLine !== undefined && { splitMultiLine }),
	});
}

/**
 * Initialize translator, prompt and LLM logger from configuration
 */
async function prepareTranslation(
	config: AppConfig,
	logger: pino.Logger
): Promise<Omit<TranslateOptions, "file">> {
	validateEnvironment(requiredEnvironment(config));

	const base = await loadInstructionBase(config.promptFile, logger);
	const profile = config.profilePath ? await loadProjectProfile(config.profilePath) : EMPTY_PROFILE;
	const selection = resolvePolicySelection(DEFAULT_POLICIES, config.policyOverrides);
	const instructions = buildInstructions({
		base,
		policies: DEFAULT_POLICIES,
		selection,
		profile,
		targetLanguage: config.targetLanguage,
	});

	const writer = new FileLogWriter(logger, config.logDir);
	const llmLogger = new LLMLogger(logger, writer);
	const profiles = buildProfiles(config.primaryModel, config.fallbackModels);

	logger.info(
		{
			translator: config.translator,
			models: profiles.map((p) => p.model),
			targetLanguage: config.targetLanguage,
			characters: profile.characters.length,
			glossary: profile.glossary.length,
			logDir: config.logDir,
		},
		"📝 Translation configured - requests are logged to the log directory"
	);

	return {
		translator: createTranslator(config),
		profiles,
		instructions,
		timeoutMs: config.timeoutMs,
		logger,
		llmLogger,
		debugWriter: writer,
	};
}

function finish(report: BatchReport): void {
	if (report.total === 0) {
		logger.warn("No files found to process");
	}
	for (const failed of report.failed) {
		logger.error({ file: failed.file, stage: failed.stage, reason: failed.reason }, "💥 File failed");
	}
	if (report.failed.length > 0) {
		process.exitCode = 1;
	}
}

/**
 * Parse command line arguments and run the selected command
 */
async function run(argv: string[]): Promise<void> {
	await yargs(argv)
		.scriptName("subtitle-relay")
		.usage("🎬 Subtitle Relay\n\nUsage: $0 <command> [options]")
		.command(
			"split <dir>",
			"Split every .srt file into time and sentence files",
			(y) => withDirectory(y).options(splitOptions).options(batchOptions),
			async (args) => {
				finish(
					await splitDirectory(path.resolve(args.dir), {
						logger,
						concurrency: args.concurrency,
						...(args.shiftHour && { shift: LEGACY_HOUR_SHIFT }),
					})
				);
			}
		)
		.command(
			"translate <dir>",
			"Translate the sentence files of a split folder",
			(y) => withTranslation(withDirectory(y)),
			async (args) => {
				const config = configFromArgs(args);
				const options = await prepareTranslation(config, logger);
				finish(await translateDirectory(path.resolve(args.dir), { ...options, concurrency: config.concurrency }));
			}
		)
		.command(
			"merge <dir>",
			"Merge time and sentence files back into SRT",
			(y) => withDirectory(y).options(mergeOptions).options(batchOptions),
			async (args) => {
				finish(
					await mergeDirectory(path.resolve(args.dir), {
						logger,
						concurrency: args.concurrency,
						splitMultiLine: args.splitMultiLine,
					})
				);
			}
		)
		.command(
			"shift <dir>",
			"Move the timing of every cue from a given number onward",
			(y) =>
				withDirectory(y)
					.options({
						start: {
							alias: "s",
							type: "number",
							default: 1,
							description: "First cue number to move",
						},
						offset: {
							alias: "o",
							type: "number",
							demandOption: true,
							description: "Seconds to add (negative to move earlier)",
						},
					})
					.options(batchOptions),
			async (args) => {
				finish(
					await shiftDirectory(path.resolve(args.dir), args.start, args.offset, {
						logger,
						concurrency: args.concurrency,
					})
				);
			}
		)
		.command(
			"run <dir>",
			"Split, translate and merge every .srt file in one go",
			(y) => withTranslation(withDirectory(y)).options(mergeOptions).options(splitOptions),
			async (args) => {
				const config = configFromArgs(args, args.splitMultiLine);
				const options = await prepareTranslation(config, logger);
				finish(
					await processDirectory(path.resolve(args.dir), {
						...options,
						concurrency: config.concurrency,
						split: args.shiftHour ? { shift: LEGACY_HOUR_SHIFT } : {},
						merge: { splitMultiLine: config.splitMultiLine },
					})
				);
			}
		)
		.command(
			"capcut <dir>",
			"Extract subtitles from CapCut projects into SRT files",
			(y) =>
				y
					.positional("dir", {
						type: "string",
						demandOption: true,
						description: "CapCut projects folder (com.lveditor.draft)",
					})
					.options({
						output: {
							alias: "o",
							type: "string",
							default: ".",
							description: "Folder to write the .srt files to",
						},
					}),
			async (args) => {
				const projects = await listCapCutProjects(path.resolve(args.dir), logger);
				logger.info({ projects: projects.length }, "🔍 Found CapCut projects");

				for (const project of projects) {
					try {
						const result = await exportCapCutProject(project.dir, path.resolve(args.output));
						if (result.status === "empty") {
							logger.info({ project: project.name }, "Project has no subtitles");
						} else {
							logger.info({ project: project.name, ...result }, "✅ Subtitles extracted");
						}
					} catch (error) {
						logger.error(
							{ project: project.name, error: error instanceof Error ? error.message : String(error) },
							"❌ Extraction failed"
						);
						process.exitCode = 1;
					}
				}
			}
		)
		.example("$0 run ./season1 -t Korean", "Split, translate and merge every file in ./season1")
		.example("$0 shift ./season1 --start 2 --offset -3600", "Move cues 2 and later one hour earlier")
		.example("$0 translate ./season1 --policy sentence_ending=keep_all", "Translate keeping all punctuation")
		.demandCommand(1)
		.strict()
		.help()
		.alias("help", "h")
		.parseAsync();
}

/**
 * Display environment setup information
 */
function showEnvironmentInfo(): void {
	logger.info(`
Environment Variables:
  GEMINI_API_KEY - Google Gemini API key (only for --translator api)
  GEMINI_BIN - Path to the gemini command-line program (default: gemini)
  LOG_DIR - Where LLM request logs and failure dumps go (default: ./logs)
  LOG_LEVEL - Logging level (default: info, options: trace, debug, info, warn, error, fatal)
    `);
}

async function main(): Promise<void> {
	try {
		logger.debug(
			{
				nodeVersion: process.version,
				platform: process.platform,
				nodeEnv: process.env.NODE_ENV,
				logLevel: process.env.LOG_LEVEL || "info",
			},
			"Environment information"
		);

		await run(hideBin(process.argv));
	} catch (error) {
		logger.error(
			{
				error: error instanceof Error ? error.message : String(error),
				stack: error instanceof Error ? error.stack : undefined,
			},
			"💥 Error occurred"
		);

		if (error instanceof Error && error.message.includes("Missing required environment variables")) {
			showEnvironmentInfo();
		}

		process.exit(1);
	}
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
	await main();
}
