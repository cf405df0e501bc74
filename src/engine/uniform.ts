/* 中文注释：把 32 位整数流映射为 [0,1) 上的 53 位均匀浮点数，再缩放到区间 */

const TWO_POW_26 = 67108864;
const TWO_POW_53 = 9007199254740992;

/** 32 位整数来源（有符号或无符号均可） */
export type Int32Source = () => number;

/**
 * 用两次 32 位抽样拼出 53 位尾数：高 27 位 + 低 26 位
 */
export function unitFraction(next32: Int32Source): number {
	const hi = (next32() >>> 0) >>> 5;
	const lo = (next32() >>> 0) >>> 6;
	return (hi * TWO_POW_26 + lo) / TWO_POW_53;
}

/**
 * 把 u ∈ [0,1] 缩放到 [lower, upper]
 *
 * 区间宽度有限时为 lower + u·(upper − lower)；宽度溢出为 Infinity（如 ±1e308）时
 * 改用 lower·(1 − u) + upper·u，两项各自有限。结果夹回 [lower, upper]。
 */
export function scaleUnit(u: number, lower: number, upper: number): number {
	const width = upper - lower;
	const value = Number.isFinite(width) ? lower + u * width : lower * (1 - u) + upper * u;
	if (value < lower) return lower;
	return value > upper ? upper : value;
}

/**
 * 连续均匀分布：lower + u·(upper − lower)，u ∈ [0,1)
 *
 * lower === upper 时恒返回 lower。
 */
export function uniformReal(next32: Int32Source, lower: number, upper: number): number {
	return scaleUnit(unitFraction(next32), lower, upper);
}
