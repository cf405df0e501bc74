/**
 * 低质量后备随机源（badrandom）
 *
 * 复刻 ANSI C 标准给出的 rand() 示例实现：31 位线性同余状态，输出高 15 位，
 * RAND_MAX = 32767，默认用墙钟秒数播种。
 *
 * 取值公式为 `lower + raw / (RAND_MAX / (upper - lower))`，不经过连续分布：
 * 只有 32768 个可能取值，且 raw 永远取不到超过 RAND_MAX 的值，
 * 区间尾部分布略有偏差。这是已知限制，保留原样。
 * 区间宽度溢出为 Infinity 时改为按 raw / RAND_MAX 线性插值。
 */
export const RAND_MAX = 32767;

export class DegradedRandom {
	private state: number;

	constructor(seed: number = Math.floor(Date.now() / 1000)) {
		this.state = seed >>> 0;
	}

	/** 返回 [0, RAND_MAX] 的整数 */
	raw(): number {
		this.state = (Math.imul(this.state, 1103515245) + 12345) >>> 0;
		return (this.state >>> 16) & RAND_MAX;
	}

	/** 返回 [lower, upper] 的实数 */
	between(lower: number, upper: number): number {
		const raw = this.raw();
		const width = upper - lower;
		if (Number.isFinite(width)) {
			return lower + raw / (RAND_MAX / width);
		}
		const f = raw / RAND_MAX;
		return Math.min(upper, Math.max(lower, lower * (1 - f) + upper * f));
	}
}
