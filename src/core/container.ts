/**
 * 依赖注入容器
 *
 * - 单例管理：日志记录器整个进程只创建一次
 * - 每次运行创建独立的随机源与过滤链
 * - 可选静默日志（测试中使用）
 */
import type { AppConfig, RunConfig } from "../config/schema.js";
import type { ILogger } from "../contracts/ILogger.js";
import type { IRandomSource } from "../contracts/IRandomSource.js";
import { createRandomSource } from "../engine/selector.js";
import { createLogger } from "../logging/createLogger.js";
import { FilterChain } from "../pipeline/filters.js";

export interface ContainerOptions {
	loggerSilent?: boolean;
	/** 固定种子（省略时由引擎从系统熵或墙钟取种子） */
	seed?: number;
}

export class ServiceContainer {
	private singletons = new Map<string, unknown>();
	private options: ContainerOptions;

	constructor(
		private config: AppConfig,
		options?: ContainerOptions,
	) {
		this.options = options ?? {};
	}

	private getSingleton<T>(key: string, factory: () => T): T {
		const existing = this.singletons.get(key);
		if (existing !== undefined) return existing as T;
		const created = factory();
		this.singletons.set(key, created);
		return created;
	}

	// 日志（写 stderr；支持静默）
	createLogger(bindings?: Record<string, unknown>): ILogger {
		const base = this.getSingleton<ILogger>("logger", () =>
			this.options.loggerSilent === true
				? createLogger({ useSilent: true })
				: createLogger({ level: this.config.logLevel, pretty: this.config.logPretty }),
		);
		return bindings ? base.child(bindings) : base;
	}

	// 随机源：按配置的引擎与区间构造，种子只取一次
	createRandomSource(run: RunConfig): IRandomSource {
		return createRandomSource(run.generator, { lower: run.lower, upper: run.upper }, this.options.seed);
	}

	// 过滤链
	createFilterChain(run: RunConfig): FilterChain {
		return new FilterChain({
			excluded: run.excluded,
			included: run.included,
			noRepeat: run.noRepeat,
			prefix: run.prefix,
			suffix: run.suffix,
			contains: run.contains,
			precision: run.precision,
		});
	}

	// 释放单例（每次运行结束时由 runRoll 调用）
	cleanup(): void {
		this.singletons.clear();
	}
}
