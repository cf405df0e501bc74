/* 中文注释：引擎选择（按标识一次性构造带状态的随机源） */
import { randomBytes } from "node:crypto";
import { congruential32, mersenne, xoroshiro128plus, xorshift128plus, type RandomGenerator } from "pure-rand";
import seedrandom from "seedrandom";
import type { IRandomSource } from "../contracts/IRandomSource.js";
import { DegradedRandom } from "./degraded.js";
import { LEHMER_MULTIPLIERS, Lehmer } from "./lehmer.js";
import {
	type GeneratorId,
	type LehmerGeneratorId,
	type PureRandGeneratorId,
	type SeedrandomGeneratorId,
	isLehmerGenerator,
	isPureRandGenerator,
	isSeedrandomGenerator,
} from "./generators.js";
import { scaleUnit, uniformReal } from "./uniform.js";

type SeedrandomPrng = seedrandom.PRNG;

/**
 * 引擎状态（封闭和类型）
 *
 * 每个变体持有自己的位生成器状态；标签在构造时确定，之后不再按名称分派。
 */
export type EngineState =
	| { family: "pure-rand"; id: PureRandGeneratorId; generator: RandomGenerator }
	| { family: "seedrandom"; id: SeedrandomGeneratorId; prng: SeedrandomPrng }
	| { family: "lehmer"; id: LehmerGeneratorId; rand: Lehmer }
	| { family: "degraded"; id: "badrandom"; rand: DegradedRandom };

export interface Bounds {
	lower: number;
	upper: number;
}

const PURE_RAND_FACTORIES: Record<PureRandGeneratorId, (seed: number) => RandomGenerator> = {
	mt19937: (seed) => mersenne(seed),
	congruential32: (seed) => congruential32(seed),
	xorshift128plus: (seed) => xorshift128plus(seed),
	xoroshiro128plus: (seed) => xoroshiro128plus(seed),
};

const SEEDRANDOM_FACTORIES: Record<SeedrandomGeneratorId, (seed: string) => SeedrandomPrng> = {
	arc4: (seed) => seedrandom(seed),
	alea: (seed) => seedrandom.alea(seed),
	xor128: (seed) => seedrandom.xor128(seed),
	xorwow: (seed) => seedrandom.xorwow(seed),
	xorshift7: (seed) => seedrandom.xorshift7(seed),
	xor4096: (seed) => seedrandom.xor4096(seed),
	tychei: (seed) => seedrandom.tychei(seed),
};

/**
 * 从系统熵源取一个 32 位种子
 */
export function entropySeed(): number {
	return randomBytes(4).readUInt32LE(0);
}

/**
 * 构造引擎状态
 *
 * @param seed 省略时：badrandom 使用墙钟秒数，其他引擎使用系统熵
 */
export function createEngineState(id: GeneratorId, seed?: number): EngineState {
	if (isPureRandGenerator(id)) {
		return { family: "pure-rand", id, generator: PURE_RAND_FACTORIES[id]((seed ?? entropySeed()) | 0) };
	}
	if (isSeedrandomGenerator(id)) {
		return { family: "seedrandom", id, prng: SEEDRANDOM_FACTORIES[id](String(seed ?? entropySeed())) };
	}
	if (isLehmerGenerator(id)) {
		return { family: "lehmer", id, rand: new Lehmer(LEHMER_MULTIPLIERS[id], seed ?? entropySeed()) };
	}
	return { family: "degraded", id, rand: new DegradedRandom(seed) };
}

/**
 * 由引擎状态构造一次性的抽样函数
 *
 * badrandom 走 ANSI C rand() 公式；其他引擎在位生成器之上叠加 [lower, upper] 连续均匀分布。
 */
function boundedDraw(state: EngineState, { lower, upper }: Bounds): () => number {
	switch (state.family) {
		case "pure-rand": {
			const generator = state.generator;
			const next32 = () => generator.unsafeNext();
			return () => uniformReal(next32, lower, upper);
		}
		case "seedrandom": {
			const prng = state.prng;
			const next32 = () => prng.int32();
			return () => uniformReal(next32, lower, upper);
		}
		case "lehmer": {
			const rand = state.rand;
			return () => scaleUnit(rand.fraction(), lower, upper);
		}
		case "degraded": {
			const rand = state.rand;
			return () => rand.between(lower, upper);
		}
	}
}

/**
 * 有界随机源（持有引擎状态，暴露单一的 next()）
 */
export class RandomSource implements IRandomSource {
	readonly id: GeneratorId;
	private readonly draw: () => number;

	constructor(state: EngineState, bounds: Bounds) {
		this.id = state.id;
		this.draw = boundedDraw(state, bounds);
	}

	next(): number {
		return this.draw();
	}
}

/**
 * 按引擎标识创建随机源（每次运行调用一次）
 *
 * @example
 * ```typescript
 * const source = createRandomSource('xoroshiro128plus', { lower: 1, upper: 6 });
 * source.next(); // 例如 3.5167...
 * ```
 */
export function createRandomSource(id: GeneratorId, bounds: Bounds, seed?: number): IRandomSource {
	return new RandomSource(createEngineState(id, seed), bounds);
}
