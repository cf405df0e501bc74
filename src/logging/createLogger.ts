import pino from "pino";
import { PinoLogger } from "./PinoLogger.js";
import type { ILogger } from "../contracts/ILogger.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * 创建日志记录器
 *
 * stdout 只输出生成的数字和统计结果，日志一律写到 stderr（fd=2）。
 *
 * @remarks
 * 环境变量（未显式传入 options 时生效）：
 * - LOG_LEVEL: 日志级别，默认 warn
 * - LOG_PRETTY: 是否使用 pino-pretty 格式（true/false），默认 false
 *
 * @param options.useSilent - 完全禁用日志（测试中使用）
 * @param options.level - 覆盖 LOG_LEVEL
 * @param options.pretty - 覆盖 LOG_PRETTY
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * logger.debug({ count: 10 }, '开始生成');
 * ```
 */
export function createLogger(options?: { useSilent?: boolean; level?: LogLevel; pretty?: boolean }): ILogger {
	if (options?.useSilent) {
		return new PinoLogger(pino({ level: "silent" }));
	}

	const level = options?.level ?? process.env.LOG_LEVEL ?? "warn";
	const pretty = options?.pretty ?? process.env.LOG_PRETTY === "true";

	if (pretty) {
		const pinoInstance = pino({
			level,
			transport: {
				target: "pino-pretty",
				// destination=2 → stderr
				options: { colorize: true, translateTime: "SYS:standard", destination: 2 },
			},
		});
		return new PinoLogger(pinoInstance);
	}

	return new PinoLogger(pino({ level }, pino.destination(2)));
}
