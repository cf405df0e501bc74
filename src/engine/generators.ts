/* 中文注释：支持的随机引擎（封闭集合） */

/** 由 pure-rand 提供的位生成器 */
export const PURE_RAND_GENERATORS = ["mt19937", "congruential32", "xorshift128plus", "xoroshiro128plus"] as const;

/** 由 seedrandom 提供的位生成器 */
export const SEEDRANDOM_GENERATORS = ["arc4", "alea", "xor128", "xorwow", "xorshift7", "xor4096", "tychei"] as const;

/** Park-Miller 乘法同余（见 lehmer.ts） */
export const LEHMER_GENERATORS = ["minstd_rand0", "minstd_rand"] as const;

/** 低质量后备引擎（墙钟时间播种） */
export const DEGRADED_GENERATOR = "badrandom";

export const GENERATOR_IDS = [
	...PURE_RAND_GENERATORS,
	...SEEDRANDOM_GENERATORS,
	...LEHMER_GENERATORS,
	DEGRADED_GENERATOR,
] as const;

export type PureRandGeneratorId = (typeof PURE_RAND_GENERATORS)[number];
export type SeedrandomGeneratorId = (typeof SEEDRANDOM_GENERATORS)[number];
export type LehmerGeneratorId = (typeof LEHMER_GENERATORS)[number];
export type GeneratorId = (typeof GENERATOR_IDS)[number];

export const DEFAULT_GENERATOR: GeneratorId = "mt19937";

export function isGeneratorId(value: string): value is GeneratorId {
	return GENERATOR_IDS.some((id) => id === value);
}

export function isPureRandGenerator(id: GeneratorId): id is PureRandGeneratorId {
	return PURE_RAND_GENERATORS.some((candidate) => candidate === id);
}

export function isSeedrandomGenerator(id: GeneratorId): id is SeedrandomGeneratorId {
	return SEEDRANDOM_GENERATORS.some((candidate) => candidate === id);
}

export function isLehmerGenerator(id: GeneratorId): id is LehmerGeneratorId {
	return LEHMER_GENERATORS.some((candidate) => candidate === id);
}
