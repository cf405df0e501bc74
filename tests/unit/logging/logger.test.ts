/* 中文注释：日志记录器单元测试 */
import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Logger as PinoInstance } from "pino";
import { PinoLogger } from "../../../src/logging/PinoLogger.js";
import { createLogger } from "../../../src/logging/createLogger.js";
import { ConfigError } from "../../../src/core/errors/index.js";

function mockPinoInstance() {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		child: vi.fn(),
	};
}

describe("PinoLogger 服务单元测试", () => {
	let mockPino: ReturnType<typeof mockPinoInstance>;
	let logger: PinoLogger;

	beforeEach(() => {
		mockPino = mockPinoInstance();
		logger = new PinoLogger(mockPino as unknown as PinoInstance);
	});

	describe("基本日志记录", () => {
		it("应该按级别记录字符串消息", () => {
			logger.debug("调试消息");
			logger.info("信息消息");
			logger.warn("警告消息");
			logger.error("错误消息");

			expect(mockPino.debug).toHaveBeenCalledWith("调试消息");
			expect(mockPino.info).toHaveBeenCalledWith("信息消息");
			expect(mockPino.warn).toHaveBeenCalledWith("警告消息");
			expect(mockPino.error).toHaveBeenCalledWith("错误消息");
		});

		it("应该记录对象与消息", () => {
			logger.debug({ value: 0.5, stage: "excluded" }, "抽样被拒绝");

			expect(mockPino.debug).toHaveBeenCalledWith({ value: 0.5, stage: "excluded" }, "抽样被拒绝");
		});

		it("应该传递对象副本而不是原对象", () => {
			const original = { accepted: 3, draws: 5 };
			logger.info(original, "生成完成");

			const passed = mockPino.info.mock.calls[0][0];
			expect(passed).not.toBe(original);
			expect(passed).toEqual(original);
		});
	});

	describe("错误对象处理", () => {
		it("应该展开 err 字段中的 Error", () => {
			const error = new Error("测试错误");
			error.stack = "Error: 测试错误\n    at test.ts:10:15";

			logger.error({ err: error, module: "cli" }, "运行失败");

			expect(mockPino.error).toHaveBeenCalledWith(
				{
					module: "cli",
					err: { name: "Error", message: "测试错误", stack: "Error: 测试错误\n    at test.ts:10:15" },
				},
				"运行失败",
			);
		});

		it("应该把 error 字段也展开到 err", () => {
			const error = new Error("另一个错误");
			error.stack = undefined;

			logger.error({ error }, "失败");

			expect(mockPino.error).toHaveBeenCalledWith(
				expect.objectContaining({ err: { name: "Error", message: "另一个错误", stack: undefined } }),
				"失败",
			);
		});

		it("BaseError 应该附带 code 与 context", () => {
			const error = new ConfigError("ZERO_COUNT", "count 无效", { option: "--number", value: 0 });

			logger.error({ err: error }, "参数无效");

			expect(mockPino.error).toHaveBeenCalledWith(
				{
					err: expect.objectContaining({
						name: "ConfigError",
						message: "count 无效",
						code: "ZERO_COUNT",
						context: { option: "--number", value: 0 },
					}),
				},
				"参数无效",
			);
		});

		it("非 Error 的 err 字段保持原样", () => {
			logger.error({ err: "字符串错误" }, "失败");

			expect(mockPino.error).toHaveBeenCalledWith({ err: "字符串错误" }, "失败");
		});
	});

	describe("子日志记录器", () => {
		it("应该创建绑定上下文的子日志记录器", () => {
			const childPino = mockPinoInstance();
			mockPino.child.mockReturnValue(childPino);

			const child = logger.child({ module: "generate" });
			child.warn("连续拒绝过多");

			expect(child).toBeInstanceOf(PinoLogger);
			expect(mockPino.child).toHaveBeenCalledWith({ module: "generate" });
			expect(childPino.warn).toHaveBeenCalledWith("连续拒绝过多");
		});
	});
});

describe("createLogger", () => {
	it("静默模式应该返回可用的 ILogger", () => {
		const logger = createLogger({ useSilent: true });

		expect(() => logger.info({ any: 1 }, "不会输出")).not.toThrow();
		expect(logger.child({ module: "x" })).toBeInstanceOf(PinoLogger);
	});
});
