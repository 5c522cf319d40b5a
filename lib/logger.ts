import pino from "pino";

/**
 * Create and configure pino logger
 */
export function createLogger(env: Readonly<Record<string, string | undefined>> = process.env): pino.Logger {
	const isDevelopment = env.NODE_ENV !== "production";
	const logLevel = env.LOG_LEVEL || "info";

	return pino({
		level: logLevel,
		...(isDevelopment && {
			transport: {
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "yyyy-mm-dd HH:MM:ss",
					ignore: "pid,hostname",
					messageFormat: "{msg}",
				},
			},
		}),
		...(!isDevelopment && {
			// Production logging format
			timestamp: pino.stdTimeFunctions.isoTime,
			formatters: {
				level: (label) => {
					return { level: label };
				},
			},
		}),
	});
}
