import type { Logger } from "pino";
import type { ILogger } from "../contracts/ILogger.js";
import { BaseError } from "../core/errors/index.js";

type LogMethod = "debug" | "info" | "warn" | "error";

/**
 * Pino 日志记录器实现
 *
 * 封装 pino 实例，实现 ILogger 接口。
 * error 级别会把 err/error 字段展开为 name/message/stack（BaseError 额外带 code 与 context）。
 *
 * @example
 * ```typescript
 * const logger = new PinoLogger(pinoInstance);
 * logger.info({ generator: 'mt19937' }, '开始生成');
 *
 * const loopLogger = logger.child({ module: 'generate' });
 * loopLogger.debug('抽样被拒绝');
 * ```
 */
export class PinoLogger implements ILogger {
	constructor(private pino: Logger) {}

	debug(obj: Record<string, unknown> | string, msg?: string): void {
		this.write("debug", obj, msg);
	}

	info(obj: Record<string, unknown> | string, msg?: string): void {
		this.write("info", obj, msg);
	}

	warn(obj: Record<string, unknown> | string, msg?: string): void {
		this.write("warn", obj, msg);
	}

	error(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.error(obj);
			return;
		}
		const payload = { ...obj };
		const err = obj.err instanceof Error ? obj.err : obj.error instanceof Error ? obj.error : undefined;
		if (err) {
			payload.err = PinoLogger.serializeError(err);
		}
		this.pino.error(payload, msg);
	}

	/**
	 * 创建子日志记录器（绑定上下文）
	 */
	child(bindings: Record<string, unknown>): ILogger {
		return new PinoLogger(this.pino.child(bindings));
	}

	private write(level: LogMethod, obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino[level](obj);
		} else {
			this.pino[level]({ ...obj }, msg);
		}
	}

	private static serializeError(err: Error): Record<string, unknown> {
		const base: Record<string, unknown> = { name: err.name, message: err.message, stack: err.stack };
		if (err instanceof BaseError) {
			base.code = err.code;
			base.context = err.context;
		}
		return base;
	}
}
