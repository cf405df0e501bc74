/* 中文注释：输出格式化（数字行、统计块、选项回显） */
import type { RunConfig } from "../config/schema.js";
import { renderFixed } from "../pipeline/filters.js";
import { STAT_KEYS, type StatKey, type Statistics, type StatSelection } from "../stats/statistics.js";

export const STAT_LABELS: Record<StatKey, string> = {
	min: "min",
	max: "max",
	median: "median",
	mean: "avg",
	variance: "variance",
	stddev: "stddev",
	cv: "cv",
};

/**
 * 定点格式化；非有限值输出 nan / inf / -inf
 */
export function formatNumber(value: number, precision: number): string {
	if (Number.isNaN(value)) return "nan";
	if (value === Number.POSITIVE_INFINITY) return "inf";
	if (value === Number.NEGATIVE_INFINITY) return "-inf";
	return renderFixed(value, precision);
}

/**
 * 单个被接受值的输出文本（含分隔符）
 */
export function formatValue(
	value: number,
	position: number,
	config: Pick<RunConfig, "precision" | "list" | "delimiter">,
): string {
	const prefix = config.list ? `${position}.\t` : "";
	return `${prefix}${formatNumber(value, config.precision)}${config.delimiter}`;
}

/**
 * 统计块：按 min、max、median、avg、variance、stddev、cv 的顺序，每个选中项一行
 */
export function formatStatistics(stats: Statistics, selection: Readonly<StatSelection>, precision: number): string {
	return STAT_KEYS.filter((key) => selection[key])
		.map((key) => `${STAT_LABELS[key]}: ${formatNumber(stats[key], precision)}\n`)
		.join("");
}

/**
 * --flags：回显解析后的全部选项
 */
export function formatFlags(config: RunConfig): string {
	const bool = (b: boolean) => (b ? "1" : "0");
	const list = (values: readonly (number | string)[]) => values.join(" ");
	const rows: [string, string][] = [
		["number,n", String(config.count)],
		["lbound,l", String(config.lower)],
		["ubound,u", String(config.upper)],
		["rounding", config.rounding],
		["precision,p", String(config.precision)],
		["exclude,x", list(config.excluded)],
		["include,i", list(config.included)],
		["norepeat", bool(config.noRepeat)],
		["prefix", list(config.prefix)],
		["suffix", list(config.suffix)],
		["contains", list(config.contains)],
		["list", bool(config.list)],
		["delim", JSON.stringify(config.delimiter)],
		["quiet,q", bool(config.quiet)],
		["numbers-force", bool(config.numbersForce)],
		["generator,g", config.generator],
		["max-draws", String(config.maxDraws)],
		...STAT_KEYS.map((key): [string, string] => [`stat-${STAT_LABELS[key]}`, bool(config.stats[key])]),
		["flags", bool(config.echoFlags)],
	];
	return `\n${rows.map(([name, value]) => `${name}: ${value}`).join("\n")}\n`;
}
