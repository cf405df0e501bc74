/* 中文注释：一次完整运行（解析 → 校验 → 生成 → 统计 → 输出），返回退出码，不直接退出进程 */
import { ConfigProvider } from "../config/ConfigProvider.js";
import type { RunConfig } from "../config/schema.js";
import { validateRunConfig } from "../config/validate.js";
import type { ILogger } from "../contracts/ILogger.js";
import type { IOutputSink } from "../contracts/IOutputSink.js";
import { ServiceContainer } from "../core/container.js";
import { BaseError } from "../core/errors/index.js";
import { ExitCode, type ExitCodeValue, exitCodeFor } from "../core/exitCodes.js";
import { formatFlags, formatStatistics, formatValue } from "../output/format.js";
import { generate } from "../pipeline/generate.js";
import { anyStatSelected, computeStatistics } from "../stats/statistics.js";
import { formatHelp, parseArgv } from "../utils/cliParser.js";

export interface RunDeps {
	sink: IOutputSink;
	env?: NodeJS.ProcessEnv;
	/** 测试用：静默日志 */
	loggerSilent?: boolean;
	/** 测试用：固定种子 */
	seed?: number;
}

/**
 * 在已校验的配置上执行生成与统计
 */
export function executeRun(config: RunConfig, container: ServiceContainer, sink: IOutputSink): number[] {
	const logger = container.createLogger({ module: "roll" });
	const source = container.createRandomSource(config);
	const chain = container.createFilterChain(config);
	logger.debug(
		{ generator: source.id, count: config.count, rounding: config.rounding, filters: chain.stages },
		"开始生成",
	);

	const { accepted, draws, rejections } = generate(source, chain, {
		count: config.count,
		rounding: config.rounding,
		numbersForce: config.numbersForce,
		maxDraws: config.maxDraws,
		logger: logger.child({ module: "generate" }),
		onAccept: config.quiet ? undefined : (value, position) => sink.out(formatValue(value, position, config)),
	});

	if (config.delimiter !== "\n" && !config.quiet) sink.out("\n");

	if (anyStatSelected(config.stats)) {
		if (!config.quiet) sink.out("\n");
		sink.out(formatStatistics(computeStatistics(accepted), config.stats, config.precision));
	}

	if (config.echoFlags) sink.out(formatFlags(config));

	logger.debug({ accepted: accepted.length, draws, rejections }, "生成完成");
	return accepted;
}

function reportFailure(err: unknown, sink: IOutputSink, logger: ILogger | undefined): ExitCodeValue {
	const code = exitCodeFor(err);
	if (err instanceof BaseError) {
		sink.err(`error: ${err.message}\n`);
		logger?.debug({ err }, "运行参数无效");
	} else if (err instanceof Error) {
		sink.err(`error: ${err.message}\n`);
		logger?.error({ err }, "运行失败");
	} else {
		sink.err("error: exception of unknown type!\n");
		logger?.error({ thrown: String(err) }, "运行失败（未知异常）");
	}
	return code;
}

/**
 * 运行 CLI
 *
 * @param argv 不含 node 与脚本路径的参数
 * @returns 退出码（请求帮助时为 ExitCode.HELP）
 *
 * @example
 * ```typescript
 * const code = runRoll(['-n', '3', '-u', '6', '--ceil'], { sink });
 * ```
 */
export function runRoll(argv: readonly string[], deps: RunDeps): ExitCodeValue {
	const { sink } = deps;
	let logger: ILogger | undefined;
	let container: ServiceContainer | undefined;
	try {
		const provider = ConfigProvider.load(deps.env ?? process.env);
		container = new ServiceContainer(provider.getConfig(), {
			loggerSilent: deps.loggerSilent,
			seed: deps.seed,
		});
		logger = container.createLogger({ module: "cli" });

		const parsed = parseArgv(argv);
		if (parsed.help) {
			sink.out(formatHelp());
			return ExitCode.HELP;
		}

		const config = validateRunConfig(parsed.options, provider.runDefaults);
		executeRun(config, container, sink);
		return ExitCode.SUCCESS;
	} catch (err) {
		return reportFailure(err, sink, logger);
	} finally {
		container?.cleanup();
	}
}
