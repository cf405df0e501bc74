import type { ILogger } from "../contracts/ILogger.js";
import type { IRandomSource } from "../contracts/IRandomSource.js";
import { GenerationError } from "../core/errors/index.js";
import type { FilterChain, FilterStage } from "./filters.js";
import { applyRounding, type RoundingMode } from "./rounding.js";

/** 无抽样上限时，连续拒绝达到该次数后告警一次 */
export const STALL_WARNING_THRESHOLD = 1_000_000;

export interface GenerateOptions {
	count: number;
	rounding: RoundingMode;
	/** true：count 表示接受的个数；false：count 表示抽样次数 */
	numbersForce: boolean;
	/** 抽样总次数上限，0 表示不限制 */
	maxDraws?: number;
	/** 连续拒绝多少次后告警（仅 numbers-force 且无上限时），默认 STALL_WARNING_THRESHOLD */
	stallWarningAfter?: number;
	/** 每接受一个值立即回调（position 为 1 起的接受序号） */
	onAccept?: (value: number, position: number) => void;
	logger?: ILogger;
}

export interface GenerateResult {
	/** 已接受序列（按插入顺序） */
	accepted: number[];
	/** 实际抽样次数 */
	draws: number;
	/** 各检查拒绝的次数 */
	rejections: Partial<Record<FilterStage, number>>;
}

/**
 * 生成循环：抽样 → 取整 → 过滤 → 累积
 *
 * attempt 从 1 开始，超过 count 时结束。非 numbers-force 模式下每次抽样都消耗一次 attempt，
 * 接受数可能少于 count；numbers-force 模式下只有被接受的值消耗 attempt，被拒绝时无限重试，
 * 过滤条件不可满足时循环不会结束，除非设置了 maxDraws。
 *
 * @throws GenerationError 达到 maxDraws 仍未结束
 */
export function generate(source: IRandomSource, chain: FilterChain, options: GenerateOptions): GenerateResult {
	const { count, rounding, numbersForce, onAccept, logger } = options;
	const maxDraws = options.maxDraws ?? 0;
	const stallWarningAfter = options.stallWarningAfter ?? STALL_WARNING_THRESHOLD;
	const accepted: number[] = [];
	const rejections: Partial<Record<FilterStage, number>> = {};
	let attempt = 1;
	let draws = 0;
	let rejectedInARow = 0;
	let stallWarned = false;

	while (attempt <= count) {
		if (maxDraws > 0 && draws >= maxDraws) {
			throw new GenerationError(`已达到抽样上限 ${maxDraws}，只接受了 ${accepted.length}/${count} 个数`, {
				maxDraws,
				accepted: accepted.length,
				count,
				rejections,
			});
		}

		const value = applyRounding(rounding, source.next());
		draws++;
		if (!numbersForce) attempt++;

		const verdict = chain.evaluate(value, accepted);
		if (!verdict.accepted) {
			rejections[verdict.stage] = (rejections[verdict.stage] ?? 0) + 1;
			rejectedInARow++;
			logger?.debug({ value, stage: verdict.stage }, "抽样被拒绝");
			if (numbersForce && maxDraws === 0 && !stallWarned && rejectedInARow >= stallWarningAfter) {
				stallWarned = true;
				logger?.warn(
					{ rejectedInARow, accepted: accepted.length, count, rejections },
					"连续拒绝次数过多，过滤条件可能无法满足（可用 --max-draws 限制）",
				);
			}
			continue;
		}

		rejectedInARow = 0;
		accepted.push(value);
		if (numbersForce) attempt++;
		onAccept?.(value, accepted.length);
	}

	return { accepted, draws, rejections };
}
