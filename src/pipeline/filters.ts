/**
 * 接受过滤链
 *
 * 对一次（已取整的）抽样决定是否追加到已接受序列。按固定顺序求值，遇到第一个拒绝即短路：
 *
 * 1. excluded：与排除集中任一值精确相等则拒绝
 * 2. included：包含集非空时，不等于其中任一值则拒绝
 * 3. noRepeat：已接受序列中已存在则拒绝
 * 4. prefix / suffix / contains：按输出精度格式化为定点字符串后匹配，至少命中一个模式才通过
 *
 * 各谓词相互独立，顺序只影响性能，不影响结果；排除集先于包含集，因此同时出现在两者中的值总被拒绝。
 * 模式集为空表示跳过该项检查。
 */

export type FilterStage = "excluded" | "included" | "noRepeat" | "prefix" | "suffix" | "contains";

export type FilterVerdict = { accepted: true } | { accepted: false; stage: FilterStage };

export interface FilterOptions {
	excluded: readonly number[];
	included: readonly number[];
	noRepeat: boolean;
	prefix: readonly string[];
	suffix: readonly string[];
	contains: readonly string[];
	/** 模式匹配使用的输出精度 */
	precision: number;
}

interface Predicate {
	stage: FilterStage;
	test(value: number, accepted: readonly number[]): boolean;
}

const ACCEPTED: FilterVerdict = { accepted: true };

/** toFixed 在绝对值达到该值时改用指数记法 */
const TO_FIXED_LIMIT = 1e21;

/**
 * 定点格式化（与输出一致）
 *
 * |value| >= 1e21 的双精度数都是整数，用 BigInt 输出精确的整数部分，小数部分补 0。
 */
export function renderFixed(value: number, precision: number): string {
	if (Number.isFinite(value) && Math.abs(value) >= TO_FIXED_LIMIT) {
		const digits = BigInt(value).toString();
		return precision > 0 ? `${digits}.${"0".repeat(precision)}` : digits;
	}
	return value.toFixed(precision);
}

function containsExactly(values: readonly number[], value: number): boolean {
	return values.some((v) => v === value);
}

function patternPredicate(
	stage: "prefix" | "suffix" | "contains",
	patterns: readonly string[],
	precision: number,
): Predicate {
	const match: (text: string, pattern: string) => boolean =
		stage === "prefix"
			? (text, pattern) => text.startsWith(pattern)
			: stage === "suffix"
				? (text, pattern) => text.endsWith(pattern)
				: (text, pattern) => text.includes(pattern);
	return {
		stage,
		test: (value) => {
			const text = renderFixed(value, precision);
			return patterns.some((pattern) => match(text, pattern));
		},
	};
}

export class FilterChain {
	private readonly predicates: Predicate[];

	constructor(options: FilterOptions) {
		const predicates: Predicate[] = [];
		if (options.excluded.length > 0) {
			const excluded = options.excluded;
			predicates.push({ stage: "excluded", test: (value) => !containsExactly(excluded, value) });
		}
		if (options.included.length > 0) {
			const included = options.included;
			predicates.push({ stage: "included", test: (value) => containsExactly(included, value) });
		}
		if (options.noRepeat) {
			predicates.push({ stage: "noRepeat", test: (value, accepted) => !containsExactly(accepted, value) });
		}
		if (options.prefix.length > 0) predicates.push(patternPredicate("prefix", options.prefix, options.precision));
		if (options.suffix.length > 0) predicates.push(patternPredicate("suffix", options.suffix, options.precision));
		if (options.contains.length > 0) predicates.push(patternPredicate("contains", options.contains, options.precision));
		this.predicates = predicates;
	}

	/** 当前启用的检查（按求值顺序） */
	get stages(): FilterStage[] {
		return this.predicates.map((p) => p.stage);
	}

	evaluate(value: number, accepted: readonly number[]): FilterVerdict {
		for (const predicate of this.predicates) {
			if (!predicate.test(value, accepted)) return { accepted: false, stage: predicate.stage };
		}
		return ACCEPTED;
	}
}
