import "dotenv/config";
import { ValidationError } from "../core/errors/index.js";
import type { AppConfig } from "./schema.js";
import { EnvSchema } from "./schema.js";

/**
 * 配置提供者
 *
 * 从环境变量（及项目根目录的 .env）读取运行时配置：日志级别、日志格式、默认引擎、默认抽样上限。
 * 单次运行的参数来自命令行，由 validateRunConfig() 负责。
 *
 * @example
 * ```typescript
 * const config = ConfigProvider.load();
 * config.logLevel;      // 'warn'
 * config.runDefaults;   // { generator: undefined, maxDraws: 0 }
 * ```
 */
export class ConfigProvider {
	private constructor(private config: AppConfig) {}

	/**
	 * 加载配置
	 *
	 * @param env 环境变量（默认 process.env）
	 * @throws ValidationError 环境变量不合法
	 */
	static load(env: NodeJS.ProcessEnv = process.env): ConfigProvider {
		const parsed = EnvSchema.safeParse(env);
		if (!parsed.success) {
			const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
			throw new ValidationError(`配置错误：${msg}。请检查 .env（参考 .env.example）或系统环境变量。`, {
				issues: parsed.error.issues,
			});
		}

		const data = parsed.data;
		return new ConfigProvider({
			logLevel: data.LOG_LEVEL,
			logPretty: data.LOG_PRETTY,
			defaultGenerator: data.RANDROLL_GENERATOR,
			defaultMaxDraws: data.RANDROLL_MAX_DRAWS,
		});
	}

	get logLevel() {
		return this.config.logLevel;
	}

	get logPretty() {
		return this.config.logPretty;
	}

	/**
	 * 命令行未指定时使用的默认值
	 */
	get runDefaults(): { generator?: string; maxDraws: number } {
		return { generator: this.config.defaultGenerator, maxDraws: this.config.defaultMaxDraws };
	}

	/**
	 * @internal
	 */
	getConfig(): AppConfig {
		return this.config;
	}
}
