import assert from "node:assert";
import { describe, test } from "node:test";
import pino from "pino";
import { LLMLogger } from "./llm-logger.ts";
import type { LogWriter } from "./log-writer.ts";
import {
	attemptTranslation,
	buildProfiles,
	MissingExecutableError,
	type TranslationRequest,
	type TranslationState,
	translateSentenceStream,
	type Translator,
	TranslatorProcessError,
} from "./translation.ts";

const testLogger = pino({ level: "silent" });

type Reply = (request: TranslationRequest) => Promise<string>;

class ScriptedTranslator implements Translator {
	readonly name = "scripted";
	readonly requests: TranslationRequest[] = [];
	private replies: Reply[];

	constructor(replies: Reply[]) {
		this.replies = replies;
	}

	async translate(request: TranslationRequest): Promise<string> {
		const reply = this.replies[this.requests.length];
		this.requests.push(request);
		if (!reply) throw new Error("No scripted reply left");
		return reply(request);
	}
}

class MemoryLogWriter implements LogWriter {
	files = new Map<string, string>();

	async write(fileName: string, content: string): Promise<void> {
		this.files.set(fileName, content);
	}

	async append(fileName: string, content: string): Promise<void> {
		this.files.set(fileName, (this.files.get(fileName) ?? "") + content);
	}
}

const answer =
	(text: string): Reply =>
	async () =>
		text;
const failWith =
	(error: Error): Reply =>
	async () => {
		throw error;
	};
const waitForAbort: Reply = (request) =>
	new Promise((_, reject) => {
		request.signal.addEventListener("abort", () => reject(request.signal.reason), { once: true });
	});

const profiles = buildProfiles("model-a", ["model-b"]);
const source = "1\nHello\n\n2\nWorld\n\n";

describe("Translation", () => {
	test("buildProfiles should drop empty and repeated models", () => {
		assert.deepStrictEqual(buildProfiles("a", ["b", "a", ""]), [
			{ name: "primary", model: "a" },
			{ name: "fallback-1", model: "b" },
		]);
	});

	describe("attemptTranslation", () => {
		const profile = { name: "primary", model: "model-a" };

		test("should return the translator output", async () => {
			const result = await attemptTranslation(new ScriptedTranslator([answer("1\nHallo")]), profile, "p", {
				timeoutMs: 1000,
			});
			assert.deepStrictEqual(result, { ok: true, text: "1\nHallo" });
		});

		test("should time out slow calls", async () => {
			const result = await attemptTranslation(new ScriptedTranslator([waitForAbort]), profile, "p", {
				timeoutMs: 10,
			});
			assert.deepStrictEqual(result, {
				ok: false,
				failure: { kind: "timeout", message: "Translation timed out after 10ms" },
			});
		});

		test("should discard a late answer from a translator that ignores the signal", async () => {
			let settled = false;
			const ignoresSignal: Reply = () =>
				new Promise((resolve) => {
					setTimeout(() => {
						settled = true;
						resolve("late");
					}, 200);
				});

			const result = await attemptTranslation(new ScriptedTranslator([ignoresSignal]), profile, "p", {
				timeoutMs: 10,
			});

			assert.deepStrictEqual(result, {
				ok: false,
				failure: { kind: "timeout", message: "Translation timed out after 10ms" },
			});
			assert.strictEqual(settled, false);
		});

		test("should not start when already cancelled", async () => {
			const controller = new AbortController();
			controller.abort();
			const translator = new ScriptedTranslator([answer("never")]);

			const result = await attemptTranslation(translator, profile, "p", {
				timeoutMs: 1000,
				signal: controller.signal,
			});
			assert.deepStrictEqual(result, { ok: false, failure: { kind: "aborted", message: "Translation was cancelled" } });
			assert.strictEqual(translator.requests.length, 0);
		});

		test("should classify failures", async () => {
			const kinds: string[] = [];
			for (const error of [
				new MissingExecutableError("gemini"),
				new TranslatorProcessError("gemini exited with code 1: quota", 1, "quota"),
				new Error("boom"),
			]) {
				const result = await attemptTranslation(new ScriptedTranslator([failWith(error)]), profile, "p", {
					timeoutMs: 1000,
				});
				kinds.push(result.ok ? "ok" : result.failure.kind);
			}
			assert.deepStrictEqual(kinds, ["missing-executable", "process", "exception"]);
		});
	});

	describe("translateSentenceStream", () => {
		test("should accept valid output from the primary profile", async () => {
			const translator = new ScriptedTranslator([answer("Loaded cached credentials.\n1\nHallo\n\n2\nWelt\n")]);
			const states: TranslationState[] = [];

			const outcome = await translateSentenceStream(source, {
				translator,
				profiles,
				instructions: "Rules",
				timeoutMs: 1000,
				logger: testLogger,
				onStateChange: (state) => states.push(state),
			});

			assert.strictEqual(outcome.status, "validated");
			assert.strictEqual(outcome.status === "validated" && outcome.text, "1\nHallo\n\n2\nWelt");
			assert.strictEqual(translator.requests[0]?.prompt, `Rules\n\n[TEXT TO TRANSLATE]\n\n${source}`);
			assert.strictEqual(translator.requests[0]?.profile.model, "model-a");
			assert.deepStrictEqual(
				states.map((s) => s.status),
				["pending", "attempting", "validated"]
			);
		});

		test("should fall back after a malformed answer", async () => {
			const writer = new MemoryLogWriter();
			const llmLogger = new LLMLogger(testLogger, writer);
			const translator = new ScriptedTranslator([answer("1\nHallo\n2\nWelt"), answer("1\nHallo\n\n2\nWelt")]);

			const outcome = await translateSentenceStream(source, {
				translator,
				profiles,
				instructions: "Rules",
				timeoutMs: 1000,
				logger: testLogger,
				llmLogger,
				debugWriter: writer,
				file: "episode1.txt",
			});

			assert.strictEqual(outcome.status, "validated");
			assert.deepStrictEqual(outcome.status === "validated" ? outcome.profile : undefined, {
				name: "fallback-1",
				model: "model-b",
			});
			assert.deepStrictEqual(
				outcome.attempts.map((a) => a.validation?.status),
				["invalid-format", "valid"]
			);
			assert.strictEqual((writer.files.get(llmLogger.getLogFile()) ?? "").trim().split("\n").length, 2);
			assert.strictEqual(
				[...writer.files.keys()].filter((name) => name.startsWith("translation-failure-")).length,
				1
			);
		});

		test("should reject truncated output", async () => {
			const outcome = await translateSentenceStream(source, {
				translator: new ScriptedTranslator([answer("1\nHallo")]),
				profiles: buildProfiles("model-a"),
				instructions: "Rules",
				timeoutMs: 1000,
				logger: testLogger,
			});

			assert.deepStrictEqual(outcome.attempts[0]?.validation, {
				status: "invalid-count",
				expectedCount: 2,
				actualCount: 1,
			});
			assert.strictEqual(outcome.status, "exhausted");
		});

		test("should accept sources that are not numbered 1, 2, 3", async () => {
			for (const numbered of ["0\nZero\n\n1\nOne\n\n", "1\nA\n\n2\nB\n\n2\nC\n\n", "1\nA\n\n3\nB\n\n"]) {
				const translator = new ScriptedTranslator([answer(numbered)]);

				const outcome = await translateSentenceStream(numbered, {
					translator,
					profiles,
					instructions: "Rules",
					timeoutMs: 1000,
					logger: testLogger,
				});

				assert.strictEqual(outcome.status, "validated", numbered);
				assert.strictEqual(translator.requests.length, 1);
			}
		});

		test("should reject output that renumbers a gapped source", async () => {
			const outcome = await translateSentenceStream("1\nA\n\n3\nB\n\n", {
				translator: new ScriptedTranslator([answer("1\nA\n\n2\nB\n")]),
				profiles: buildProfiles("model-a"),
				instructions: "Rules",
				timeoutMs: 1000,
				logger: testLogger,
			});

			assert.strictEqual(outcome.status, "exhausted");
			assert.deepStrictEqual(outcome.attempts[0]?.validation, {
				status: "invalid-sequence",
				expectedIndex: 3,
				foundIndex: 2,
			});
		});

		test("should give up once every profile failed", async () => {
			const outcome = await translateSentenceStream(source, {
				translator: new ScriptedTranslator([
					failWith(new TranslatorProcessError("exit 1", 1, "")),
					failWith(new TranslatorProcessError("exit 1", 1, "")),
				]),
				profiles,
				instructions: "Rules",
				timeoutMs: 1000,
				logger: testLogger,
			});

			assert.deepStrictEqual(
				outcome.status === "exhausted" ? outcome.reason : undefined,
				"All profiles (model-a, model-b) failed to produce a valid translation"
			);
			assert.strictEqual(outcome.attempts.length, 2);
		});

		test("should stop at once when the executable is missing", async () => {
			const translator = new ScriptedTranslator([failWith(new MissingExecutableError("gemini")), answer("unused")]);

			const outcome = await translateSentenceStream(source, {
				translator,
				profiles,
				instructions: "Rules",
				timeoutMs: 1000,
				logger: testLogger,
			});

			assert.strictEqual(outcome.status, "exhausted");
			assert.strictEqual(translator.requests.length, 1);
		});

		test("should pass empty streams through untouched", async () => {
			const translator = new ScriptedTranslator([]);

			const outcome = await translateSentenceStream("  \n", {
				translator,
				profiles,
				instructions: "Rules",
				timeoutMs: 1000,
				logger: testLogger,
			});

			assert.deepStrictEqual(outcome, { status: "validated", text: "  \n", profile: undefined, attempts: [] });
			assert.strictEqual(translator.requests.length, 0);
		});
	});
});
