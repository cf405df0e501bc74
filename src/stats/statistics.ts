/* 中文注释：统计引擎（生成结束后对已接受序列计算一次；只读输入，内部在副本上分区） */

export const STAT_KEYS = ["min", "max", "median", "mean", "variance", "stddev", "cv"] as const;

export type StatKey = (typeof STAT_KEYS)[number];

export type StatSelection = Record<StatKey, boolean>;

export type Statistics = Record<StatKey, number>;

export function noStats(): StatSelection {
	return { min: false, max: false, median: false, mean: false, variance: false, stddev: false, cv: false };
}

export function anyStatSelected(selection: StatSelection): boolean {
	return STAT_KEYS.some((key) => selection[key]);
}

/**
 * 最小/最大值：单次线性扫描。空序列返回 NaN。
 */
export function minMax(values: readonly number[]): { min: number; max: number } {
	if (values.length === 0) return { min: Number.NaN, max: Number.NaN };
	let min = values[0];
	let max = values[0];
	for (const value of values) {
		if (value < min) min = value;
		if (value > max) max = value;
	}
	return { min, max };
}

function swap(values: number[], i: number, j: number): void {
	const tmp = values[i];
	values[i] = values[j];
	values[j] = tmp;
}

/**
 * 原地快速选择：返回后 values[k] 为第 k 小元素，
 * 下标 < k 的元素都 <= values[k]，下标 > k 的元素都 >= values[k]
 */
export function selectNth(values: number[], k: number): void {
	let left = 0;
	let right = values.length - 1;
	while (left < right) {
		const pivot = values[(left + right) >>> 1];
		let i = left;
		let j = right;
		while (i <= j) {
			while (values[i] < pivot) i++;
			while (values[j] > pivot) j--;
			if (i <= j) {
				swap(values, i, j);
				i++;
				j--;
			}
		}
		if (k <= j) right = j;
		else if (k >= i) left = i;
		else return;
	}
}

/**
 * 中位数
 *
 * - 奇数个：分区后位于 ⌊n/2⌋ 的元素
 * - 偶数个：以下中位（下标 n/2 − 1）分区，取 (下中位 + 下半部分最大值) / 2
 *
 * 偶数规则不是常见的“两中间值平均”：[1,2,3,4] 的下半部分为 {1,2}，结果是 (2 + 2) / 2 = 2。
 */
export function median(values: readonly number[]): number {
	const n = values.length;
	if (n === 0) return Number.NaN;
	const work = [...values];
	if (n % 2 === 1) {
		const mid = Math.floor(n / 2);
		selectNth(work, mid);
		return work[mid];
	}
	const lowerMiddleIndex = n / 2 - 1;
	selectNth(work, lowerMiddleIndex);
	const lowerMiddle = work[lowerMiddleIndex];
	const lowerHalfMax = minMax(work.slice(0, lowerMiddleIndex + 1)).max;
	return (lowerMiddle + lowerHalfMax) / 2;
}

export function mean(values: readonly number[]): number {
	if (values.length === 0) return Number.NaN;
	let sum = 0;
	for (const value of values) sum += value;
	return sum / values.length;
}

/**
 * 总体方差（除以 N）
 */
export function populationVariance(values: readonly number[]): number {
	if (values.length === 0) return Number.NaN;
	const mu = mean(values);
	let squares = 0;
	for (const value of values) squares += (value - mu) ** 2;
	return squares / values.length;
}

/**
 * 全部统计量
 *
 * 空序列时每项为 NaN；均值为 0 时变异系数为 ±Infinity 或 NaN，不抛出。
 */
export function computeStatistics(values: readonly number[]): Statistics {
	const { min, max } = minMax(values);
	const mu = mean(values);
	const variance = populationVariance(values);
	const stddev = Math.sqrt(variance);
	return {
		min,
		max,
		median: median(values),
		mean: mu,
		variance,
		stddev,
		cv: stddev / mu,
	};
}
