/**
 * 接口定义层（Contracts）
 *
 * @packageDocumentation
 */

export * from "./ILogger.js";
export * from "./IRandomSource.js";
export * from "./IOutputSink.js";
