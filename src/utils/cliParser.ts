import type { RawRunOptions } from "../config/schema.js";
import { ValidationError } from "../core/errors/index.js";

type KeysOfType<T, V> = { [K in keyof T]-?: NonNullable<T[K]> extends V ? K : never }[keyof T];

type ValueKey = KeysOfType<RawRunOptions, string>;
type ListKey = KeysOfType<RawRunOptions, string[]>;
type FlagKey = KeysOfType<RawRunOptions, boolean>;

type OptionSpec = { long: string; short?: string; description: string } & (
	| { kind: "value"; key: ValueKey }
	| { kind: "list"; key: ListKey }
	| { kind: "flag"; key: FlagKey }
);

export interface ParsedArgs {
	help: boolean;
	options: RawRunOptions;
}

/**
 * 支持的命令行选项（同时用于生成帮助文本）
 */
export const OPTION_SPECS: readonly OptionSpec[] = [
	{ long: "number", short: "n", kind: "value", key: "number", description: "生成的数量（默认 1）" },
	{ long: "lbound", short: "l", kind: "value", key: "lbound", description: "最小值（默认 0）" },
	{ long: "ubound", short: "u", kind: "value", key: "ubound", description: "最大值（默认 1）" },
	{ long: "ceil", short: "c", kind: "flag", key: "ceil", description: "向上取整" },
	{ long: "floor", short: "f", kind: "flag", key: "floor", description: "向下取整" },
	{ long: "round", short: "r", kind: "flag", key: "round", description: "四舍五入（.5 远离零）" },
	{ long: "trunc", short: "t", kind: "flag", key: "trunc", description: "向零截断" },
	{ long: "rounding", kind: "value", key: "rounding", description: "取整模式：none/ceil/floor/round/trunc" },
	{ long: "precision", short: "p", kind: "value", key: "precision", description: "输出精度（0-17，取整时为 0）" },
	{ long: "exclude", short: "x", kind: "list", key: "exclude", description: "不输出这些数（空格分隔）" },
	{ long: "include", short: "i", kind: "list", key: "include", description: "只输出这些数（空格分隔）" },
	{ long: "norepeat", kind: "flag", key: "norepeat", description: "不输出重复的数" },
	{ long: "prefix", kind: "list", key: "prefix", description: "只输出以这些数字串开头的数" },
	{ long: "suffix", kind: "list", key: "suffix", description: "只输出以这些数字串结尾的数" },
	{ long: "contains", kind: "list", key: "contains", description: "只输出包含这些数字串的数" },
	{ long: "list", kind: "flag", key: "list", description: "每行前加序号" },
	{ long: "delim", kind: "value", key: "delim", description: "分隔符（默认换行）" },
	{ long: "quiet", short: "q", kind: "flag", key: "quiet", description: "不输出数字（配合统计使用）" },
	{ long: "numbers-force", kind: "flag", key: "numbersForce", description: "保证输出数量等于 --number" },
	{ long: "generator", short: "g", kind: "value", key: "generator", description: "随机引擎" },
	{ long: "max-draws", kind: "value", key: "maxDraws", description: "抽样次数上限（0 不限制）" },
	{ long: "stat-min", kind: "flag", key: "statMin", description: "输出最小值" },
	{ long: "stat-max", kind: "flag", key: "statMax", description: "输出最大值" },
	{ long: "stat-median", kind: "flag", key: "statMedian", description: "输出中位数" },
	{ long: "stat-avg", kind: "flag", key: "statAvg", description: "输出平均值" },
	{ long: "stat-mean", kind: "flag", key: "statAvg", description: "同 --stat-avg" },
	{ long: "stat-variance", kind: "flag", key: "statVariance", description: "输出总体方差" },
	{ long: "stat-stddev", kind: "flag", key: "statStddev", description: "输出标准差" },
	{ long: "stat-cv", kind: "flag", key: "statCv", description: "输出变异系数" },
	{ long: "stat-all", kind: "flag", key: "statAll", description: "输出全部统计量" },
	{ long: "flags", kind: "flag", key: "flags", description: "输出解析后的全部选项" },
];

const BY_LONG = new Map(OPTION_SPECS.map((spec) => [spec.long, spec]));
const BY_SHORT = new Map(OPTION_SPECS.flatMap((spec) => (spec.short ? [[spec.short, spec] as const] : [])));

/**
 * 是否为选项标记（负数如 -1.5 视为值）
 */
export function isOptionToken(token: string): boolean {
	return token.startsWith("--") || /^-[a-zA-Z]/.test(token);
}

function lookup(token: string): { spec: OptionSpec | undefined; inline?: string; help: boolean } {
	if (token.startsWith("--")) {
		const body = token.slice(2);
		const eq = body.indexOf("=");
		const name = eq >= 0 ? body.slice(0, eq) : body;
		const inline = eq >= 0 ? body.slice(eq + 1) : undefined;
		return { spec: BY_LONG.get(name), inline, help: name === "help" };
	}
	const name = token.slice(1, 2);
	const rest = token.slice(2);
	return { spec: BY_SHORT.get(name), inline: rest.length > 0 ? rest : undefined, help: name === "h" };
}

/**
 * 解析命令行参数
 *
 * 支持 `--name value`、`--name=value`、`-n value`、`-n5`；多值选项（--exclude 等）
 * 连续吞掉后续的非选项参数，可重复出现并累加。
 *
 * @param argv 不含 node 与脚本路径的参数数组（即 process.argv.slice(2)）
 * @throws ValidationError 未知选项、缺少参数值或出现多余的位置参数
 *
 * @example
 * ```typescript
 * parseArgv(['-n', '5', '--exclude', '1', '-2', '--ceil']);
 * // => { help: false, options: { number: '5', exclude: ['1', '-2'], ceil: true } }
 * ```
 */
export function parseArgv(argv: readonly string[]): ParsedArgs {
	const options: RawRunOptions = {};
	let help = false;

	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!isOptionToken(token)) {
			throw new ValidationError(`无法识别的参数：${token}`, { field: "argv", value: token });
		}

		const { spec, inline, help: isHelp } = lookup(token);
		if (isHelp) {
			help = true;
			continue;
		}
		if (!spec) {
			throw new ValidationError(`未知选项：${token}`, { field: "argv", value: token });
		}

		switch (spec.kind) {
			case "flag":
				if (inline !== undefined) {
					throw new ValidationError(`选项 --${spec.long} 不接受参数`, { field: spec.key, value: inline });
				}
				options[spec.key] = true;
				break;
			case "value": {
				if (inline !== undefined) {
					options[spec.key] = inline;
					break;
				}
				const next = argv[i + 1];
				if (next === undefined) {
					throw new ValidationError(`选项 --${spec.long} 缺少参数`, { field: spec.key });
				}
				options[spec.key] = next;
				i++;
				break;
			}
			case "list": {
				const values = [...(options[spec.key] ?? [])];
				if (inline !== undefined) values.push(inline);
				while (i + 1 < argv.length && !isOptionToken(argv[i + 1])) {
					values.push(argv[i + 1]);
					i++;
				}
				options[spec.key] = values;
				break;
			}
		}
	}

	return { help, options };
}

/**
 * 帮助文本
 */
export function formatHelp(programName = "randroll"): string {
	const lines = OPTION_SPECS.map((spec) => {
		const names = spec.short ? `-${spec.short}, --${spec.long}` : `    --${spec.long}`;
		const arg = spec.kind === "value" ? " <值>" : spec.kind === "list" ? " <值...>" : "";
		return `  ${(names + arg).padEnd(30)} ${spec.description}`;
	});
	return [`用法：${programName} [选项]`, "", "选项：", "  -h, --help                     显示帮助", ...lines, ""].join("\n");
}
