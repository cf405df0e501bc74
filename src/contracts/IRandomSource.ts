import type { GeneratorId } from "../engine/generators.js";

/**
 * 有界随机数源
 *
 * 每次调用 next() 返回 [lower, upper] 区间内的一个实数。
 * 实例自带引擎状态，种子在构造时取一次。
 */
export interface IRandomSource {
	/** 引擎标识 */
	readonly id: GeneratorId;

	/** 抽取下一个值 */
	next(): number;
}
