/**
 * Park-Miller 乘法同余生成器（minstd_rand0 / minstd_rand）
 *
 * 状态 x ∈ [1, M - 1]，x' = a·x mod M，M = 2^31 - 1。
 * a·x < 2^47，在双精度内精确，不需要大整数。
 */
export const LEHMER_MODULUS = 2147483647;

export const LEHMER_MULTIPLIERS = {
	minstd_rand0: 16807,
	minstd_rand: 48271,
} as const;

/** 输出值的个数：[1, M - 1] */
const RANGE = LEHMER_MODULUS - 1;

export class Lehmer {
	private state: number;

	constructor(
		private readonly multiplier: number,
		seed: number,
	) {
		const reduced = (seed >>> 0) % LEHMER_MODULUS;
		this.state = reduced === 0 ? 1 : reduced;
	}

	/** 返回 [1, M - 1] 的整数 */
	next(): number {
		this.state = (this.state * this.multiplier) % LEHMER_MODULUS;
		return this.state;
	}

	/**
	 * [0,1] 上的均匀浮点数：两次输出按 RANGE 进制拼接，再除以 RANGE²
	 *
	 * 结果在舍入后可能等于 1，由 scaleUnit 夹回上界。
	 */
	fraction(): number {
		const low = this.next() - 1;
		const high = this.next() - 1;
		return (low + high * RANGE) / (RANGE * RANGE);
	}
}
