import { BaseError } from "./BaseError.js";

/**
 * 参数验证错误
 *
 * 表示命令行参数或环境变量无法解析为期望类型（例如 `--number abc`）。
 * 语义层面的配置冲突使用 ConfigError，每种冲突有独立的错误代码。
 *
 * @example
 * ```typescript
 * throw new ValidationError('--lbound 必须是数字', {
 *   field: 'lower',
 *   value: 'abc',
 *   expected: 'finite number'
 * });
 * ```
 */
export class ValidationError extends BaseError {
	readonly code = "VALIDATION_ERROR";
	readonly retryable = false;

	constructor(message: string, context?: Record<string, unknown>) {
		super(message, context);
	}

	/**
	 * 验证失败的字段名
	 */
	get field(): string | undefined {
		const field = this.context?.field;
		return typeof field === "string" ? field : undefined;
	}

	/**
	 * 实际值
	 */
	get value(): unknown {
		return this.context?.value;
	}

	/**
	 * 期望值或格式
	 */
	get expected(): string | undefined {
		const expected = this.context?.expected;
		return typeof expected === "string" ? expected : undefined;
	}
}
