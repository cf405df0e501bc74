/**
 * 日志记录器接口
 *
 * 支持 debug、info、warn、error 四个级别与上下文绑定（child logger）。
 *
 * @example
 * ```typescript
 * const logger: ILogger = createLogger();
 * logger.warn({ rejected: 1_000_000 }, '连续拒绝过多');
 * logger.error({ err: new Error('失败') }, '运行失败');
 *
 * const loopLogger = logger.child({ module: 'generate' });
 * ```
 */
export interface ILogger {
	debug(obj: Record<string, unknown>, msg?: string): void;
	debug(msg: string): void;

	info(obj: Record<string, unknown>, msg?: string): void;
	info(msg: string): void;

	warn(obj: Record<string, unknown>, msg?: string): void;
	warn(msg: string): void;

	/**
	 * 错误级别日志
	 * @param obj 结构化数据（err/error 字段为 Error 时自动展开堆栈）
	 */
	error(obj: Record<string, unknown>, msg?: string): void;
	error(msg: string): void;

	/**
	 * 创建子日志记录器（绑定上下文）
	 */
	child(bindings: Record<string, unknown>): ILogger;
}
