/* 中文注释：进程退出码（与错误代码一一对应） */
import { BaseError } from "./errors/index.js";

export const ExitCode = {
	SUCCESS: 0,
	KNOWN_ERROR: 1,
	UNKNOWN_ERROR: 2,
	ZERO_COUNT: 3,
	ROUNDING_CONFLICT: 4,
	PRECISION_OVERFLOW: 5,
	PRECISION_UNDERFLOW: 6,
	EMPTY_LIST: 7,
	PATTERN_NOT_NUMERIC: 9,
	UNKNOWN_GENERATOR: 10,
	BOUNDS_INVERTED: 12,
	DRAW_LIMIT_EXCEEDED: 13,
	// 请求帮助：不是错误，进程最终以 0 退出
	HELP: -1,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

function isExitCodeKey(code: string): code is keyof typeof ExitCode {
	return Object.prototype.hasOwnProperty.call(ExitCode, code);
}

/**
 * 将抛出的值映射为退出码
 *
 * - BaseError：按 code 查表，未登记的 code 视为已知错误
 * - 其他 Error：已知错误（1）
 * - 非 Error 抛出物：未知错误（2）
 */
export function exitCodeFor(err: unknown): ExitCodeValue {
	if (err instanceof BaseError) {
		return isExitCodeKey(err.code) ? ExitCode[err.code] : ExitCode.KNOWN_ERROR;
	}
	if (err instanceof Error) return ExitCode.KNOWN_ERROR;
	return ExitCode.UNKNOWN_ERROR;
}

/**
 * 进程实际使用的退出码（HELP 哨兵映射为 0）
 */
export function processExitCode(code: ExitCodeValue): number {
	return code === ExitCode.HELP ? 0 : code;
}
