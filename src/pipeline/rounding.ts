/* 中文注释：取整策略（互斥，抽样后、过滤前应用一次） */

export const ROUNDING_MODES = ["none", "ceil", "floor", "round", "trunc"] as const;

export type RoundingMode = (typeof ROUNDING_MODES)[number];

/**
 * 四舍五入，.5 远离零（Math.round 会把 -2.5 取成 -2）
 */
export function roundHalfAwayFromZero(value: number): number {
	return value < 0 ? -Math.round(-value) : Math.round(value);
}

const ROUNDERS: Record<RoundingMode, (value: number) => number> = {
	none: (value) => value,
	ceil: Math.ceil,
	floor: Math.floor,
	round: roundHalfAwayFromZero,
	trunc: Math.trunc,
};

export function applyRounding(mode: RoundingMode, value: number): number {
	return ROUNDERS[mode](value);
}
