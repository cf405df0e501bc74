/* 中文注释：错误体系与退出码测试 */
import { describe, it, expect } from "vitest";
import { BaseError, ConfigError, GenerationError, ValidationError } from "../../../src/core/errors/index.js";
import { ExitCode, exitCodeFor, processExitCode } from "../../../src/core/exitCodes.js";

describe("ValidationError", () => {
	it("应该正确创建验证错误", () => {
		const error = new ValidationError("参数错误：--lbound: 不是有限数字：abc", {
			field: "lbound",
			value: "abc",
			expected: "finite number",
		});

		expect(error).toBeInstanceOf(Error);
		expect(error).toBeInstanceOf(BaseError);
		expect(error.name).toBe("ValidationError");
		expect(error.code).toBe("VALIDATION_ERROR");
		expect(error.retryable).toBe(false);
		expect(error.field).toBe("lbound");
		expect(error.value).toBe("abc");
		expect(error.expected).toBe("finite number");
	});

	it("非字符串上下文字段返回 undefined", () => {
		const error = new ValidationError("x", { field: 3 });

		expect(error.field).toBeUndefined();
		expect(error.expected).toBeUndefined();
	});
});

describe("ConfigError", () => {
	it("应该携带错误代码与选项名", () => {
		const error = new ConfigError("UNKNOWN_GENERATOR", "--generator 无效", { option: "--generator", value: "foo" });

		expect(error.code).toBe("UNKNOWN_GENERATOR");
		expect(error.option).toBe("--generator");
		expect(error.retryable).toBe(false);
	});

	it("应该正确序列化为 JSON", () => {
		const json = new ConfigError("ZERO_COUNT", "count 无效", { option: "--number" }).toJSON();

		expect(json).toMatchObject({
			name: "ConfigError",
			code: "ZERO_COUNT",
			message: "count 无效",
			retryable: false,
			context: { option: "--number" },
		});
		expect(json).toHaveProperty("stack");
	});
});

describe("exitCodeFor", () => {
	it("配置错误映射为各自的退出码", () => {
		expect(exitCodeFor(new ConfigError("ZERO_COUNT", ""))).toBe(3);
		expect(exitCodeFor(new ConfigError("ROUNDING_CONFLICT", ""))).toBe(4);
		expect(exitCodeFor(new ConfigError("PRECISION_OVERFLOW", ""))).toBe(5);
		expect(exitCodeFor(new ConfigError("PRECISION_UNDERFLOW", ""))).toBe(6);
		expect(exitCodeFor(new ConfigError("EMPTY_LIST", ""))).toBe(7);
		expect(exitCodeFor(new ConfigError("PATTERN_NOT_NUMERIC", ""))).toBe(9);
		expect(exitCodeFor(new ConfigError("UNKNOWN_GENERATOR", ""))).toBe(10);
		expect(exitCodeFor(new ConfigError("BOUNDS_INVERTED", ""))).toBe(12);
	});

	it("生成错误映射为 13", () => {
		const error = new GenerationError("已达到抽样上限");

		expect(error.code).toBe("DRAW_LIMIT_EXCEEDED");
		expect(exitCodeFor(error)).toBe(ExitCode.DRAW_LIMIT_EXCEEDED);
	});

	it("区分已知错误与未知异常", () => {
		expect(exitCodeFor(new ValidationError("x"))).toBe(ExitCode.KNOWN_ERROR);
		expect(exitCodeFor(new RangeError("x"))).toBe(ExitCode.KNOWN_ERROR);
		expect(exitCodeFor("boom")).toBe(ExitCode.UNKNOWN_ERROR);
		expect(exitCodeFor(undefined)).toBe(ExitCode.UNKNOWN_ERROR);
	});

	it("帮助哨兵以 0 退出", () => {
		expect(processExitCode(ExitCode.HELP)).toBe(0);
		expect(processExitCode(ExitCode.ZERO_COUNT)).toBe(3);
	});
});
