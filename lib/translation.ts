import type pino from "pino";
import { saveDebugData } from "./debug.ts";
import type { LLMLogger, LLMRequestContext } from "./llm-logger.ts";
import type { LogWriter } from "./log-writer.ts";
import { buildTranslationPrompt } from "./prompt.ts";
import { readStreamEntries } from "./srt.ts";
import {
	DEFAULT_BANNERS,
	describeValidationResult,
	filterBannerLines,
	type ValidationResult,
	validateTranslationResult,
} from "./validation.ts";

export interface TranslationProfile {
	name: string;
	model: string;
}

export interface TranslationRequest {
	prompt: string;
	profile: TranslationProfile;
	/** Implementations must reject once this signal aborts. */
	signal: AbortSignal;
}

export interface Translator {
	readonly name: string;
	translate(request: TranslationRequest): Promise<string>;
}

export class TranslatorProcessError extends Error {
	readonly exitCode: number | null;
	readonly stderr: string;

	constructor(message: string, exitCode: number | null, stderr: string) {
		super(message);
		this.name = "TranslatorProcessError";
		this.exitCode = exitCode;
		this.stderr = stderr;
	}
}

export class MissingExecutableError extends Error {
	readonly executable: string;

	constructor(executable: string) {
		super(`Translator executable "${executable}" was not found. Make sure it is installed and on PATH.`);
		this.name = "MissingExecutableError";
		this.executable = executable;
	}
}

export class TranslationTimeoutError extends Error {
	constructor(timeoutMs: number) {
		super(`Translation timed out after ${timeoutMs}ms`);
		this.name = "TranslationTimeoutError";
	}
}

export type FailureKind = "process" | "timeout" | "missing-executable" | "aborted" | "exception";

export interface TranslationFailure {
	kind: FailureKind;
	message: string;
}

export type AttemptResult = { ok: true; text: string } | { ok: false; failure: TranslationFailure };

export function buildProfiles(
	primaryModel: string,
	fallbackModels: readonly string[] = []
): TranslationProfile[] {
	const models = [primaryModel, ...fallbackModels].filter(
		(model, i, all) => model.trim().length > 0 && all.indexOf(model) === i
	);
	return models.map((model, i) => ({ name: i === 0 ? "primary" : `fallback-${i}`, model }));
}

function classifyFailure(error: unknown, timedOut: boolean, cancelled: boolean): TranslationFailure {
	const message = error instanceof Error ? error.message : String(error);
	if (timedOut) return { kind: "timeout", message };
	if (cancelled) return { kind: "aborted", message };
	if (error instanceof MissingExecutableError) return { kind: "missing-executable", message };
	if (error instanceof TranslatorProcessError) return { kind: "process", message };
	return { kind: "exception", message };
}

/**
 * Runs one translator call bounded by `timeoutMs`. Never throws: every
 * failure is returned as a value, and output that arrives after the timeout
 * is discarded.
 */
export async function attemptTranslation(
	translator: Translator,
	profile: TranslationProfile,
	prompt: string,
	options: { timeoutMs: number; signal?: AbortSignal }
): Promise<AttemptResult> {
	const { signal, timeoutMs } = options;
	if (signal?.aborted) {
		return { ok: false, failure: { kind: "aborted", message: "Translation was cancelled" } };
	}

	const controller = new AbortController();
	let timedOut = false;
	const onAbort = () => controller.abort(signal?.reason);
	signal?.addEventListener("abort", onAbort, { once: true });
	const timer = setTimeout(() => {
		timedOut = true;
		controller.abort(new TranslationTimeoutError(timeoutMs));
	}, timeoutMs);

	// Settles on abort even when the translator ignores the signal.
	const aborted = new Promise<never>((_, reject) => {
		controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
	});

	try {
		const text = await Promise.race([
			translator.translate({ prompt, profile, signal: controller.signal }),
			aborted,
		]);
		if (timedOut) {
			return { ok: false, failure: { kind: "timeout", message: new TranslationTimeoutError(timeoutMs).message } };
		}
		return { ok: true, text };
	} catch (error) {
		return { ok: false, failure: classifyFailure(error, timedOut, signal?.aborted ?? false) };
	} finally {
		clearTimeout(timer);
		signal?.removeEventListener("abort", onAbort);
	}
}

export interface AttemptRecord {
	profile: TranslationProfile;
	durationMs: number;
	failure?: TranslationFailure;
	validation?: ValidationResult;
}

export type TranslationState =
	| { status: "pending" }
	| { status: "attempting"; profile: TranslationProfile; attempt: number }
	| { status: "validated"; profile: TranslationProfile | undefined }
	| { status: "exhausted"; reason: string };

export type TranslationOutcome =
	| { status: "validated"; text: string; profile: TranslationProfile | undefined; attempts: AttemptRecord[] }
	| { status: "exhausted"; reason: string; attempts: AttemptRecord[] };

export interface TranslateOptions {
	translator: Translator;
	profiles: readonly TranslationProfile[];
	instructions: string;
	timeoutMs: number;
	logger: pino.Logger;
	llmLogger?: LLMLogger;
	debugWriter?: LogWriter;
	banners?: readonly string[];
	signal?: AbortSignal;
	file?: string;
	onStateChange?: (state: TranslationState) => void;
}

const FATAL_FAILURES: readonly FailureKind[] = ["missing-executable", "aborted"];

/**
 * Translates a sentence stream, trying each profile in order until one
 * returns output that passes validation.
 */
export async function translateSentenceStream(
	content: string,
	options: TranslateOptions
): Promise<TranslationOutcome> {
	const { translator, profiles, logger, llmLogger, file } = options;
	const attempts: AttemptRecord[] = [];
	const setState = (state: TranslationState) => options.onStateChange?.(state);

	setState({ status: "pending" });

	if (!content.trim()) {
		logger.warn({ file }, "Sentence stream is empty, skipping translation");
		setState({ status: "validated", profile: undefined });
		return { status: "validated", text: content, profile: undefined, attempts };
	}

	const sourceIndices = readStreamEntries(content).map((entry) => entry.index);
	const sourceEntries = sourceIndices.length;
	const prompt = buildTranslationPrompt(options.instructions, content);

	for (const [i, profile] of profiles.entries()) {
		setState({ status: "attempting", profile, attempt: i + 1 });
		logger.info({ file, profile: profile.name, model: profile.model }, `🌐 Translating with '${profile.model}'`);

		const context: LLMRequestContext = {
			profile: profile.name,
			model: profile.model,
			sourceEntries,
			...(file !== undefined && { file }),
		};
		const requestId = llmLogger?.logRequest(context, prompt) ?? "";
		const startTime = Date.now();
		const result = await attemptTranslation(translator, profile, prompt, {
			timeoutMs: options.timeoutMs,
			...(options.signal && { signal: options.signal }),
		});
		const durationMs = Date.now() - startTime;

		if (!result.ok) {
			attempts.push({ profile, durationMs, failure: result.failure });
			await llmLogger?.logError(requestId, context, prompt, result.failure, durationMs);
			logger.error(
				{ file, model: profile.model, kind: result.failure.kind, error: result.failure.message },
				"❌ Translator call failed"
			);

			if (FATAL_FAILURES.includes(result.failure.kind)) {
				const reason = result.failure.message;
				setState({ status: "exhausted", reason });
				return { status: "exhausted", reason, attempts };
			}
			continue;
		}

		const text = filterBannerLines(result.text, options.banners ?? DEFAULT_BANNERS);
		const validation = validateTranslationResult(text, { expectedIndices: sourceIndices });
		const message = describeValidationResult(validation);
		attempts.push({ profile, durationMs, validation });
		await llmLogger?.logResponse(requestId, context, prompt, text, durationMs, validation.status);

		if (validation.status === "valid") {
			logger.info({ file, model: profile.model, durationMs }, "✅ Translation passed format and order checks");
			setState({ status: "validated", profile });
			return { status: "validated", text: text.trim(), profile, attempts };
		}

		logger.warn(
			{
				file,
				model: profile.model,
				validation: validation.status,
				...(validation.status === "invalid-format" && { context: validation.context.join("\n") }),
			},
			`⚠️  Translation rejected: ${message}`
		);

		if (options.debugWriter) {
			await saveDebugData(
				options.debugWriter,
				{
					...(file !== undefined && { file }),
					profile: profile.name,
					sourceContent: content,
					rawOutput: text,
					validation,
				},
				logger
			);
		}
	}

	const reason = `All profiles (${profiles.map((p) => p.model).join(", ")}) failed to produce a valid translation`;
	setState({ status: "exhausted", reason });
	return { status: "exhausted", reason, attempts };
}
