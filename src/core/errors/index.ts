/**
 * 错误体系（Error Hierarchy）
 *
 * @remarks
 * 错误层次：
 * - BaseError: 抽象基类
 *   - ValidationError: 参数无法解析（退出码 1）
 *   - ConfigError: 配置语义校验失败（每个代码独立退出码）
 *   - GenerationError: 生成循环超出抽样上限
 *
 * 退出码映射见 core/exitCodes.ts。
 *
 * @packageDocumentation
 */

export { BaseError } from "./BaseError.js";
export { ValidationError } from "./ValidationError.js";
export { ConfigError, type ConfigErrorCode } from "./ConfigError.js";
export { GenerationError } from "./GenerationError.js";
