/* 中文注释：接受过滤链 */
import { describe, it, expect } from "vitest";
import { FilterChain, type FilterOptions, renderFixed } from "../../../src/pipeline/filters.js";

function chain(overrides: Partial<FilterOptions>): FilterChain {
	return new FilterChain({
		excluded: [],
		included: [],
		noRepeat: false,
		prefix: [],
		suffix: [],
		contains: [],
		precision: 2,
		...overrides,
	});
}

describe("FilterChain", () => {
	it("没有任何检查时全部接受", () => {
		const empty = chain({});

		expect(empty.stages).toEqual([]);
		expect(empty.evaluate(0.123, [0.123])).toEqual({ accepted: true });
	});

	it("按固定顺序启用检查", () => {
		const full = chain({
			excluded: [1],
			included: [2],
			noRepeat: true,
			prefix: ["1"],
			suffix: ["2"],
			contains: ["3"],
		});

		expect(full.stages).toEqual(["excluded", "included", "noRepeat", "prefix", "suffix", "contains"]);
	});

	describe("excluded / included", () => {
		it("排除集精确相等，无容差", () => {
			const c = chain({ excluded: [0.3, 2] });

			expect(c.evaluate(2, [])).toEqual({ accepted: false, stage: "excluded" });
			expect(c.evaluate(0.1 + 0.2, [])).toEqual({ accepted: true });
		});

		it("包含集非空时只接受其中的值", () => {
			const c = chain({ included: [1, 2] });

			expect(c.evaluate(2, [])).toEqual({ accepted: true });
			expect(c.evaluate(3, [])).toEqual({ accepted: false, stage: "included" });
		});

		it("同时在排除集和包含集中的值总被拒绝（排除优先）", () => {
			const c = chain({ excluded: [2], included: [2, 3] });

			expect(c.evaluate(2, [])).toEqual({ accepted: false, stage: "excluded" });
			expect(c.evaluate(3, [])).toEqual({ accepted: true });
		});
	});

	describe("noRepeat", () => {
		it("拒绝已接受序列中出现过的值", () => {
			const c = chain({ noRepeat: true });

			expect(c.evaluate(1, [3, 1])).toEqual({ accepted: false, stage: "noRepeat" });
			expect(c.evaluate(2, [3, 1])).toEqual({ accepted: true });
		});

		it("关闭时允许重复", () => {
			expect(chain({}).evaluate(1, [1])).toEqual({ accepted: true });
		});
	});

	describe("字符串模式", () => {
		it("按配置精度渲染后匹配后缀", () => {
			expect(chain({ precision: 2, suffix: ["14"] }).evaluate(3.14159, [])).toEqual({ accepted: true });
			expect(chain({ precision: 2, suffix: ["159"] }).evaluate(3.14159, [])).toEqual({
				accepted: false,
				stage: "suffix",
			});
		});

		it("前缀与包含", () => {
			expect(chain({ prefix: ["3.1"] }).evaluate(3.14159, [])).toEqual({ accepted: true });
			expect(chain({ prefix: ["4", "2"] }).evaluate(3.14159, [])).toEqual({ accepted: false, stage: "prefix" });
			expect(chain({ contains: [".1"] }).evaluate(3.14159, [])).toEqual({ accepted: true });
			expect(chain({ contains: ["9"] }).evaluate(3.14159, [])).toEqual({ accepted: false, stage: "contains" });
		});

		it("任一模式命中即通过", () => {
			expect(chain({ suffix: ["99", "14"] }).evaluate(3.14159, [])).toEqual({ accepted: true });
		});

		it("精度为 0 时匹配整数文本", () => {
			const c = chain({ precision: 0, prefix: ["1"] });

			expect(c.evaluate(17, [])).toEqual({ accepted: true });
			expect(c.evaluate(27, [])).toEqual({ accepted: false, stage: "prefix" });
		});

		it("第一个失败的检查决定拒绝原因", () => {
			const c = chain({ noRepeat: true, prefix: ["9"] });

			expect(c.evaluate(5, [5])).toEqual({ accepted: false, stage: "noRepeat" });
			expect(c.evaluate(5, [])).toEqual({ accepted: false, stage: "prefix" });
		});
	});
});

describe("renderFixed", () => {
	it("定点格式", () => {
		expect(renderFixed(3.14159, 2)).toBe("3.14");
		expect(renderFixed(2, 3)).toBe("2.000");
		expect(renderFixed(-0.5, 0)).toBe("-1");
	});

	it("绝对值 >= 1e21 时仍输出定点而非指数记法", () => {
		expect(renderFixed(1e21, 2)).toBe("1000000000000000000000.00");
		expect(renderFixed(2 ** 70, 0)).toBe("1180591620717411303424");
		expect(renderFixed(-(2 ** 70), 1)).toBe("-1180591620717411303424.0");
	});

	it("大数按定点字符串参与模式匹配", () => {
		const suffix = chain({ suffix: ["424"], precision: 0 });
		const prefix = chain({ prefix: ["118"], precision: 0 });

		expect(suffix.evaluate(2 ** 70, [])).toEqual({ accepted: true });
		expect(prefix.evaluate(2 ** 70, [])).toEqual({ accepted: true });
		expect(suffix.evaluate(1e21, [])).toEqual({ accepted: false, stage: "suffix" });
	});
});
