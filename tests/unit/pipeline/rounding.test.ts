import { describe, it, expect } from "vitest";
import { applyRounding, ROUNDING_MODES, roundHalfAwayFromZero } from "../../../src/pipeline/rounding.js";

describe("applyRounding", () => {
	it("none 原样返回", () => {
		expect(applyRounding("none", 3.14159)).toBe(3.14159);
	});

	it("ceil 向 +∞", () => {
		expect(applyRounding("ceil", 0.2)).toBe(1);
		expect(applyRounding("ceil", -1.8)).toBe(-1);
	});

	it("floor 向 −∞", () => {
		expect(applyRounding("floor", 0.8)).toBe(0);
		expect(applyRounding("floor", -0.2)).toBe(-1);
	});

	it("round 最近整数，.5 远离零", () => {
		expect(applyRounding("round", 2.5)).toBe(3);
		expect(applyRounding("round", -2.5)).toBe(-3);
		expect(applyRounding("round", 2.4)).toBe(2);
		expect(applyRounding("round", -2.6)).toBe(-3);
	});

	it("trunc 向零", () => {
		expect(applyRounding("trunc", 2.7)).toBe(2);
		expect(applyRounding("trunc", -2.7)).toBe(-2);
	});

	it("各模式幂等", () => {
		const samples = [-3.5, -2.5, -0.4, 0, 0.5, 1.49, 2.5, 7.999];
		for (const mode of ROUNDING_MODES) {
			for (const value of samples) {
				const once = applyRounding(mode, value);
				expect(applyRounding(mode, once)).toBe(once);
			}
		}
	});
});

describe("roundHalfAwayFromZero", () => {
	it("与 Math.round 在负半数上不同", () => {
		expect(Math.round(-0.5)).toBe(-0);
		expect(roundHalfAwayFromZero(-0.5)).toBe(-1);
		expect(roundHalfAwayFromZero(0.5)).toBe(1);
	});
});
