/**
 * 日志管理模块
 *
 * ILogger 接口 + 基于 pino 的实现；日志写往 stderr，避免污染数字输出。
 *
 * @packageDocumentation
 */

export { PinoLogger } from "./PinoLogger.js";
export { createLogger, type LogLevel } from "./createLogger.js";
