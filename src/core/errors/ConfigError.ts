import { BaseError } from "./BaseError.js";

/**
 * 配置错误代码
 *
 * 每种校验失败对应独立代码，调用方据此给出具体提示与退出码。
 */
export type ConfigErrorCode =
	| "ZERO_COUNT"
	| "ROUNDING_CONFLICT"
	| "PRECISION_OVERFLOW"
	| "PRECISION_UNDERFLOW"
	| "EMPTY_LIST"
	| "PATTERN_NOT_NUMERIC"
	| "UNKNOWN_GENERATOR"
	| "BOUNDS_INVERTED";

/**
 * 运行配置错误
 *
 * 由 validateRunConfig() 在生成开始前抛出，对本次运行是终止性的。
 *
 * @example
 * ```typescript
 * throw new ConfigError('ZERO_COUNT', "--number 必须 >= 1", { option: '--number', value: 0 });
 * ```
 */
export class ConfigError extends BaseError {
	readonly retryable = false;

	constructor(
		readonly code: ConfigErrorCode,
		message: string,
		context?: Record<string, unknown>,
	) {
		super(message, context);
	}

	/**
	 * 出错的命令行选项
	 */
	get option(): string | undefined {
		const option = this.context?.option;
		return typeof option === "string" ? option : undefined;
	}
}
