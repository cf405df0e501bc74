/* 中文注释：配置层入口（环境配置 + 运行参数校验） */
export { ConfigProvider } from "./ConfigProvider.js";
export { validateRunConfig, isNumericPattern, type RunDefaults } from "./validate.js";
export {
	MAX_PRECISION,
	RawRunOptionsSchema,
	EnvSchema,
	type AppConfig,
	type RawRunOptions,
	type RunConfig,
} from "./schema.js";
