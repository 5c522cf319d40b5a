import type pino from "pino";
import type { LogWriter } from "./log-writer.ts";

export interface LLMLogEntry {
	timestamp: string;
	requestId: string;
	profile: string;
	model: string;
	file?: string;
	request: {
		prompt: string;
		promptLength: number;
		sourceEntries: number;
	};
	response?: {
		content: string;
		responseLength: number;
		duration: number;
		validation: string;
	};
	error?: {
		kind: string;
		message: string;
		duration: number;
	};
}

export interface LLMRequestContext {
	profile: string;
	model: string;
	file?: string;
	sourceEntries: number;
}

export class LLMLogger {
	private logger: pino.Logger;
	private writer: LogWriter;
	private logFile: string;

	constructor(logger: pino.Logger, writer: LogWriter, now: Date = new Date()) {
		this.logger = logger;
		this.writer = writer;
		this.logFile = `llm-requests-${now.toISOString().split("T")[0] ?? "unknown"}.jsonl`;
	}

	private generateRequestId(): string {
		return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
	}

	getLogFile(): string {
		return this.logFile;
	}

	logRequest(context: LLMRequestContext, prompt: string): string {
		const requestId = this.generateRequestId();

		this.logger.debug(
			{
				requestId,
				profile: context.profile,
				model: context.model,
				file: context.file,
				promptLength: prompt.length,
				sourceEntries: context.sourceEntries,
			},
			"🤖 LLM request started"
		);

		return requestId;
	}

	async logResponse(
		requestId: string,
		context: LLMRequestContext,
		prompt: string,
		response: string,
		duration: number,
		validation: string
	): Promise<void> {
		this.logger.debug(
			{
				requestId,
				profile: context.profile,
				model: context.model,
				duration,
				promptLength: prompt.length,
				responseLength: response.length,
				validation,
			},
			"✅ LLM request completed"
		);

		await this.append({
			timestamp: new Date().toISOString(),
			requestId,
			profile: context.profile,
			model: context.model,
			...(context.file !== undefined && { file: context.file }),
			request: {
				prompt,
				promptLength: prompt.length,
				sourceEntries: context.sourceEntries,
			},
			response: {
				content: response,
				responseLength: response.length,
				duration,
				validation,
			},
		});
	}

	async logError(
		requestId: string,
		context: LLMRequestContext,
		prompt: string,
		failure: { kind: string; message: string },
		duration: number
	): Promise<void> {
		this.logger.warn(
			{
				requestId,
				profile: context.profile,
				model: context.model,
				kind: failure.kind,
				error: failure.message,
				duration,
			},
			"❌ LLM request failed"
		);

		await this.append({
			timestamp: new Date().toISOString(),
			requestId,
			profile: context.profile,
			model: context.model,
			...(context.file !== undefined && { file: context.file }),
			request: {
				prompt,
				promptLength: prompt.length,
				sourceEntries: context.sourceEntries,
			},
			error: { ...failure, duration },
		});
	}

	private async append(entry: LLMLogEntry): Promise<void> {
		await this.writer.append(this.logFile, `${JSON.stringify(entry)}\n`);
	}
}
