/* 中文注释：原始选项与环境变量的 Schema（只做类型转换；语义校验见 validate.ts） */
import { z } from "zod";
import { type GeneratorId } from "../engine/generators.js";
import { ROUNDING_MODES, type RoundingMode } from "../pipeline/rounding.js";
import type { StatSelection } from "../stats/statistics.js";

/** IEEE-754 双精度可区分的最大十进制有效位数 */
export const MAX_PRECISION = 17;

export const DEFAULT_COUNT = 1;
export const DEFAULT_LOWER = 0;
export const DEFAULT_UPPER = 1;
export const DEFAULT_DELIMITER = "\n";

/**
 * 命令行解析结果（键为长选项名的 camelCase 形式）
 *
 * 多值选项出现但没有值时为空数组，由校验阶段报告 EMPTY_LIST。
 */
export interface RawRunOptions {
	number?: string;
	lbound?: string;
	ubound?: string;
	precision?: string;
	rounding?: string;
	ceil?: boolean;
	floor?: boolean;
	round?: boolean;
	trunc?: boolean;
	exclude?: string[];
	include?: string[];
	norepeat?: boolean;
	prefix?: string[];
	suffix?: string[];
	contains?: string[];
	list?: boolean;
	delim?: string;
	quiet?: boolean;
	numbersForce?: boolean;
	generator?: string;
	maxDraws?: string;
	statMin?: boolean;
	statMax?: boolean;
	statMedian?: boolean;
	statAvg?: boolean;
	statVariance?: boolean;
	statStddev?: boolean;
	statCv?: boolean;
	statAll?: boolean;
	flags?: boolean;
}

/**
 * 校验后的运行配置（冻结，不可修改）
 */
export interface RunConfig {
	readonly count: number;
	readonly lower: number;
	readonly upper: number;
	readonly precision: number;
	readonly rounding: RoundingMode;
	readonly excluded: readonly number[];
	readonly included: readonly number[];
	readonly noRepeat: boolean;
	readonly prefix: readonly string[];
	readonly suffix: readonly string[];
	readonly contains: readonly string[];
	readonly generator: GeneratorId;
	readonly numbersForce: boolean;
	readonly quiet: boolean;
	readonly list: boolean;
	readonly delimiter: string;
	readonly stats: Readonly<StatSelection>;
	readonly echoFlags: boolean;
	readonly maxDraws: number;
}

const finiteNumber = z
	.string()
	.trim()
	.min(1, "缺少数值")
	.transform((text, ctx) => {
		const value = Number(text);
		if (!Number.isFinite(value)) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: `不是有限数字：${text}` });
			return z.NEVER;
		}
		return value;
	});

const integer = finiteNumber.refine((value) => Number.isSafeInteger(value), "必须是整数");

/**
 * 原始选项的类型转换 Schema
 *
 * 数值范围（count >= 1、精度上下限等）不在此处检查，而由 validateRunConfig 按固定顺序给出具体错误。
 */
export const RawRunOptionsSchema = z.object({
	number: integer.optional(),
	lbound: finiteNumber.optional(),
	ubound: finiteNumber.optional(),
	precision: integer.optional(),
	rounding: z.enum(ROUNDING_MODES).optional(),
	ceil: z.boolean().default(false),
	floor: z.boolean().default(false),
	round: z.boolean().default(false),
	trunc: z.boolean().default(false),
	exclude: z.array(finiteNumber).optional(),
	include: z.array(finiteNumber).optional(),
	norepeat: z.boolean().default(false),
	prefix: z.array(z.string()).optional(),
	suffix: z.array(z.string()).optional(),
	contains: z.array(z.string()).optional(),
	list: z.boolean().default(false),
	delim: z.string().optional(),
	quiet: z.boolean().default(false),
	numbersForce: z.boolean().default(false),
	generator: z.string().optional(),
	maxDraws: integer.optional(),
	statMin: z.boolean().default(false),
	statMax: z.boolean().default(false),
	statMedian: z.boolean().default(false),
	statAvg: z.boolean().default(false),
	statVariance: z.boolean().default(false),
	statStddev: z.boolean().default(false),
	statCv: z.boolean().default(false),
	statAll: z.boolean().default(false),
	flags: z.boolean().default(false),
});

export type TypedRunOptions = z.infer<typeof RawRunOptionsSchema>;

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

/**
 * 环境变量 Schema
 */
export const EnvSchema = z.object({
	LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
	LOG_PRETTY: z
		.enum(["true", "false"])
		.default("false")
		.transform((s) => s === "true"),
	RANDROLL_GENERATOR: z.string().min(1).optional(),
	RANDROLL_MAX_DRAWS: z
		.string()
		.trim()
		.regex(/^\d+$/, "必须是非负整数（0 表示不限制）")
		.default("0")
		.transform((s) => Number(s)),
});

export type AppConfig = {
	logLevel: (typeof LOG_LEVELS)[number];
	logPretty: boolean;
	/** 未指定 --generator 时使用的引擎（尚未校验） */
	defaultGenerator?: string;
	/** 未指定 --max-draws 时的抽样上限 */
	defaultMaxDraws: number;
};
