import { ConfigError, ValidationError } from "../core/errors/index.js";
import { DEFAULT_GENERATOR, GENERATOR_IDS, isGeneratorId } from "../engine/generators.js";
import type { RoundingMode } from "../pipeline/rounding.js";
import type { StatSelection } from "../stats/statistics.js";
import {
	DEFAULT_COUNT,
	DEFAULT_DELIMITER,
	DEFAULT_LOWER,
	DEFAULT_UPPER,
	MAX_PRECISION,
	type RawRunOptions,
	RawRunOptionsSchema,
	type RunConfig,
	type TypedRunOptions,
} from "./schema.js";

/**
 * 未在命令行出现时的默认值（来自环境配置）
 */
export interface RunDefaults {
	generator?: string;
	maxDraws?: number;
}

const NUMERIC_PATTERN = /^[0-9.]*$/;

type PatternOption = "prefix" | "suffix" | "contains";
type ListOption = "exclude" | "include" | PatternOption;

const LIST_OPTIONS: ListOption[] = ["exclude", "include", "prefix", "suffix", "contains"];
const PATTERN_OPTIONS: PatternOption[] = ["prefix", "suffix", "contains"];

/**
 * 模式只能由数字和至多一个小数点组成
 */
export function isNumericPattern(pattern: string): boolean {
	return NUMERIC_PATTERN.test(pattern) && pattern.split(".").length <= 2;
}

function parseTypes(raw: RawRunOptions): TypedRunOptions {
	const parsed = RawRunOptionsSchema.safeParse(raw);
	if (!parsed.success) {
		const msg = parsed.error.issues.map((i) => `--${kebab(i.path.join("."))}: ${i.message}`).join("; ");
		throw new ValidationError(`参数错误：${msg}`, { issues: parsed.error.issues });
	}
	return parsed.data;
}

function kebab(name: string): string {
	return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

function selectedRoundingModes(opts: TypedRunOptions): RoundingMode[] {
	const modes = new Set<RoundingMode>();
	if (opts.rounding && opts.rounding !== "none") modes.add(opts.rounding);
	if (opts.ceil) modes.add("ceil");
	if (opts.floor) modes.add("floor");
	if (opts.round) modes.add("round");
	if (opts.trunc) modes.add("trunc");
	return [...modes];
}

function selectedStats(opts: TypedRunOptions): Readonly<StatSelection> {
	const all = opts.statAll;
	const selection: StatSelection = {
		min: all || opts.statMin,
		max: all || opts.statMax,
		median: all || opts.statMedian,
		mean: all || opts.statAvg,
		variance: all || opts.statVariance,
		stddev: all || opts.statStddev,
		cv: all || opts.statCv,
	};
	return Object.freeze(selection);
}

/**
 * 校验并规范化运行配置
 *
 * 检查顺序：
 * 1. count >= 1（ZERO_COUNT）
 * 2. 取整模式至多一个（ROUNDING_CONFLICT）
 * 3. 启用取整时精度强制为 0（规范化，不是错误）
 * 4. 精度不超过 MAX_PRECISION（PRECISION_OVERFLOW）
 * 5. 精度不小于 0（PRECISION_UNDERFLOW）
 * 6. 多值选项出现时必须带值（EMPTY_LIST）
 * 7. prefix/suffix/contains 只能是数字（PATTERN_NOT_NUMERIC）
 * 8. 引擎标识属于支持的集合（UNKNOWN_GENERATOR）
 * 9. lbound <= ubound（BOUNDS_INVERTED）
 *
 * @throws ValidationError 参数无法转换为期望类型
 * @throws ConfigError 语义校验失败
 */
export function validateRunConfig(raw: RawRunOptions, defaults: RunDefaults = {}): RunConfig {
	const opts = parseTypes(raw);

	const count = opts.number ?? DEFAULT_COUNT;
	if (count < 1) {
		throw new ConfigError("ZERO_COUNT", "--number 的参数无效（必须 >= 1）", { option: "--number", value: count });
	}

	const modes = selectedRoundingModes(opts);
	if (modes.length > 1) {
		throw new ConfigError("ROUNDING_CONFLICT", "--ceil、--floor、--round、--trunc 互斥", {
			option: "--rounding",
			value: modes,
		});
	}
	const rounding: RoundingMode = modes[0] ?? "none";

	const precision = rounding === "none" ? (opts.precision ?? MAX_PRECISION) : 0;
	if (precision > MAX_PRECISION) {
		throw new ConfigError("PRECISION_OVERFLOW", `--precision 不能大于双精度的有效位数（${MAX_PRECISION}）`, {
			option: "--precision",
			value: precision,
		});
	}
	if (precision < 0) {
		throw new ConfigError("PRECISION_UNDERFLOW", "--precision 不能小于 0", { option: "--precision", value: precision });
	}

	for (const name of LIST_OPTIONS) {
		const values = opts[name];
		if (values !== undefined && values.length === 0) {
			throw new ConfigError("EMPTY_LIST", `--${name} 未提供参数（多个参数以空格分隔）`, { option: `--${name}` });
		}
	}

	for (const name of PATTERN_OPTIONS) {
		const bad = (opts[name] ?? []).find((pattern) => !isNumericPattern(pattern));
		if (bad !== undefined) {
			throw new ConfigError("PATTERN_NOT_NUMERIC", "--prefix、--suffix、--contains 只能是数字", {
				option: `--${name}`,
				value: bad,
			});
		}
	}

	const generator = opts.generator ?? defaults.generator ?? DEFAULT_GENERATOR;
	if (!isGeneratorId(generator)) {
		throw new ConfigError("UNKNOWN_GENERATOR", `--generator 必须是：${GENERATOR_IDS.join(", ")}`, {
			option: "--generator",
			value: generator,
		});
	}

	const lower = opts.lbound ?? DEFAULT_LOWER;
	const upper = opts.ubound ?? DEFAULT_UPPER;
	if (lower > upper) {
		throw new ConfigError("BOUNDS_INVERTED", "--lbound 不能大于 --ubound", {
			option: "--lbound",
			value: { lower, upper },
		});
	}

	const maxDraws = opts.maxDraws ?? defaults.maxDraws ?? 0;
	if (maxDraws < 0) {
		throw new ValidationError("参数错误：--max-draws 不能小于 0", { field: "maxDraws", value: maxDraws, expected: ">= 0" });
	}

	return Object.freeze({
		count,
		lower,
		upper,
		precision,
		rounding,
		excluded: Object.freeze([...(opts.exclude ?? [])]),
		included: Object.freeze([...(opts.include ?? [])]),
		noRepeat: opts.norepeat,
		prefix: Object.freeze([...(opts.prefix ?? [])]),
		suffix: Object.freeze([...(opts.suffix ?? [])]),
		contains: Object.freeze([...(opts.contains ?? [])]),
		generator,
		numbersForce: opts.numbersForce,
		quiet: opts.quiet,
		list: opts.list,
		delimiter: opts.delim ?? DEFAULT_DELIMITER,
		stats: selectedStats(opts),
		echoFlags: opts.flags,
		maxDraws,
	});
}
