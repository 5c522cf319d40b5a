import { spawn } from "node:child_process";
import { GoogleGenAI } from "@google/genai";
import {
	MissingExecutableError,
	type TranslationRequest,
	type Translator,
	TranslatorProcessError,
} from "./translation.ts";

function abortError(signal: AbortSignal): Error {
	return signal.reason instanceof Error ? signal.reason : new Error("Translation was aborted");
}

/**
 * Runs the Gemini command-line client (`gemini -m <model>`) with the prompt
 * on stdin.
 */
export class GeminiCliTranslator implements Translator {
	readonly name = "gemini-cli";
	private executable: string;

	constructor(executable = "gemini") {
		this.executable = executable;
	}

	translate({ prompt, profile, signal }: TranslationRequest): Promise<string> {
		return new Promise((resolve, reject) => {
			if (signal.aborted) {
				reject(abortError(signal));
				return;
			}

			const child = spawn(this.executable, ["-m", profile.model], {
				stdio: ["pipe", "pipe", "pipe"],
			});

			let stdout = "";
			let stderr = "";
			let settled = false;

			const finish = (error: Error | undefined, output?: string) => {
				if (settled) return;
				settled = true;
				signal.removeEventListener("abort", onAbort);
				if (error) {
					reject(error);
				} else {
					resolve(output ?? "");
				}
			};

			const onAbort = () => {
				child.kill("SIGTERM");
				finish(abortError(signal));
			};
			signal.addEventListener("abort", onAbort, { once: true });

			child.stdout.setEncoding("utf8");
			child.stderr.setEncoding("utf8");
			child.stdout.on("data", (data: string) => {
				stdout += data;
			});
			child.stderr.on("data", (data: string) => {
				stderr += data;
			});

			child.on("error", (err: NodeJS.ErrnoException) => {
				if (err.code === "ENOENT") {
					finish(new MissingExecutableError(this.executable));
				} else {
					finish(new TranslatorProcessError(`Failed to start ${this.executable}: ${err.message}`, null, stderr));
				}
			});

			child.on("close", (code) => {
				if (code === 0) {
					finish(undefined, stdout);
				} else {
					finish(
						new TranslatorProcessError(
							`${this.executable} exited with code ${code}: ${stderr.trim()}`,
							code,
							stderr
						)
					);
				}
			});

			// EPIPE when the process dies before reading its input; "close" reports the failure.
			child.stdin.on("error", (err) => {
				stderr += err.message;
			});
			child.stdin.end(prompt, "utf8");
		});
	}
}

/**
 * Calls the Gemini API directly through @google/genai, streaming the answer.
 */
export class GeminiApiTranslator implements Translator {
	readonly name = "gemini-api";
	private client: GoogleGenAI;

	constructor(apiKey: string) {
		this.client = new GoogleGenAI({ apiKey });
	}

	async translate({ prompt, profile, signal }: TranslationRequest): Promise<string> {
		if (signal.aborted) throw abortError(signal);

		const stream = await this.client.models.generateContentStream({
			model: profile.model,
			contents: prompt,
			config: { abortSignal: signal },
		});

		let translatedContent = "";
		for await (const chunk of stream) {
			if (signal.aborted) throw abortError(signal);
			translatedContent += chunk.text || "";
		}

		return translatedContent;
	}
}
