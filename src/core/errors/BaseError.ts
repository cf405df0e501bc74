/**
 * 基础错误抽象类
 *
 * 所有 randroll 错误的基类，提供统一的错误代码、上下文与序列化机制。
 *
 * @remarks
 * - code：唯一标识错误类型，由 exitCodeFor() 映射为进程退出码
 * - retryable：是否可重试（配置类错误均不可重试）
 * - context：附加调试和日志所需的上下文数据
 *
 * @example
 * ```typescript
 * class MyError extends BaseError {
 *   readonly code = 'MY_ERROR';
 *   readonly retryable = false;
 * }
 *
 * throw new MyError('发生错误', { option: '--number' });
 * ```
 */
export abstract class BaseError extends Error {
	/** 错误代码（唯一标识） */
	abstract readonly code: string;

	/** 是否可重试 */
	abstract readonly retryable: boolean;

	/**
	 * @param message 错误消息
	 * @param context 上下文信息（用于调试和日志）
	 */
	constructor(
		message: string,
		public readonly context?: Record<string, unknown>,
	) {
		super(message);
		this.name = this.constructor.name;
		Error.captureStackTrace?.(this, this.constructor);
	}

	/**
	 * 序列化为 JSON（便于日志记录）
	 */
	toJSON(): object {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			retryable: this.retryable,
			context: this.context,
			stack: this.stack,
		};
	}
}
