import { BaseError } from "./BaseError.js";

/**
 * 生成循环错误
 *
 * 目前只有一种：设置了 --max-draws 且在达到目标数量前耗尽了抽样次数。
 */
export class GenerationError extends BaseError {
	readonly code = "DRAW_LIMIT_EXCEEDED";
	readonly retryable = false;

	constructor(message: string, context?: Record<string, unknown>) {
		super(message, context);
	}
}
