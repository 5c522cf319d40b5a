import { readFile } from "node:fs/promises";
import type pino from "pino";
import { GeminiApiTranslator, GeminiCliTranslator } from "./gemini.ts";
import { BASE_PROMPT, type NamePair, type ProjectProfile } from "./prompt.ts";
import type { Translator } from "./translation.ts";

export type TranslatorKind = "cli" | "api";

export interface AppConfig {
	translator: TranslatorKind;
	geminiApiKey: string;
	geminiBin: string;
	primaryModel: string;
	fallbackModels: string[];
	timeoutMs: number;
	concurrency: number;
	targetLanguage: string;
	promptFile?: string;
	profilePath?: string;
	policyOverrides: string[];
	splitMultiLine: boolean;
	logDir: string;
}

export interface ConfigArgs {
	translator?: TranslatorKind;
	model?: string;
	fallbackModel?: string[];
	timeout?: number;
	concurrency?: number;
	targetLanguage?: string;
	promptFile?: string;
	profile?: string;
	policy?: string[];
	splitMultiLine?: boolean;
}

export const DEFAULT_MODEL = "gemini-2.5-flash";
export const DEFAULT_FALLBACK_MODEL = "gemini-2.5-pro";
export const DEFAULT_TIMEOUT_SECONDS = 300;

type Env = Readonly<Record<string, string | undefined>>;

export function createConfig(args: ConfigArgs, env: Env = process.env): AppConfig {
	const timeoutSeconds = args.timeout ?? DEFAULT_TIMEOUT_SECONDS;
	if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
		throw new Error(`Timeout must be a positive number of seconds, got ${timeoutSeconds}`);
	}
	const concurrency = args.concurrency ?? 1;
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new Error(`Concurrency must be a positive integer, got ${concurrency}`);
	}

	return {
		translator: args.translator ?? "cli",
		geminiApiKey: env.GEMINI_API_KEY || "",
		geminiBin: env.GEMINI_BIN || "gemini",
		primaryModel: args.model ?? DEFAULT_MODEL,
		fallbackModels: args.fallbackModel ?? [DEFAULT_FALLBACK_MODEL],
		timeoutMs: Math.round(timeoutSeconds * 1000),
		concurrency,
		targetLanguage: args.targetLanguage ?? "Korean",
		...(args.promptFile !== undefined && { promptFile: args.promptFile }),
		...(args.profile !== undefined && { profilePath: args.profile }),
		policyOverrides: args.policy ?? [],
		splitMultiLine: args.splitMultiLine ?? true,
		logDir: env.LOG_DIR || "./logs",
	};
}

export function parseTranslatorKind(value: string): TranslatorKind {
	if (value === "cli" || value === "api") return value;
	throw new Error(`Unknown translator "${value}", expected cli or api`);
}

export function requiredEnvironment(config: Pick<AppConfig, "translator">): string[] {
	return config.translator === "api" ? ["GEMINI_API_KEY"] : [];
}

/**
 * Validate required environment variables
 */
export function validateEnvironment(requiredVars: readonly string[], env: Env = process.env): void {
	const missingVars = requiredVars.filter((varName) => !env[varName]);

	if (missingVars.length > 0) {
		throw new Error(`Missing required environment variables: ${missingVars.join(", ")}`);
	}
}

export function createTranslator(config: AppConfig): Translator {
	return config.translator === "api"
		? new GeminiApiTranslator(config.geminiApiKey)
		: new GeminiCliTranslator(config.geminiBin);
}

export class ProfileError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ProfileError";
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseNamePairs(value: unknown, field: string): NamePair[] {
	if (value === undefined) return [];
	if (!Array.isArray(value)) {
		throw new ProfileError(`"${field}" must be an array`);
	}

	return value.map((item: unknown, i) => {
		if (!isRecord(item) || typeof item.source !== "string" || typeof item.target !== "string") {
			throw new ProfileError(`"${field}[${i}]" must have string "source" and "target"`);
		}
		return { source: item.source, target: item.target };
	});
}

export function parseProjectProfile(data: unknown): ProjectProfile {
	if (!isRecord(data)) {
		throw new ProfileError("Profile must be a JSON object");
	}
	return {
		characters: parseNamePairs(data.characters, "characters"),
		glossary: parseNamePairs(data.glossary, "glossary"),
	};
}

export async function loadProjectProfile(profilePath: string): Promise<ProjectProfile> {
	const raw = await readFile(profilePath, "utf8");
	let data: unknown;
	try {
		data = JSON.parse(raw);
	} catch (error) {
		throw new ProfileError(
			`Profile ${profilePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
		);
	}
	return parseProjectProfile(data);
}

/**
 * Reads the base instructions from a prompt file. A missing file falls back
 * to the built-in prompt with a warning.
 */
export async function loadInstructionBase(
	promptFile: string | undefined,
	logger: pino.Logger
): Promise<string> {
	if (promptFile === undefined) return BASE_PROMPT;

	try {
		return await readFile(promptFile, "utf8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			logger.warn({ promptFile }, "Prompt file not found, using the built-in prompt");
			return BASE_PROMPT;
		}
		throw error;
	}
}
