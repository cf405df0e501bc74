import { describe, expect, it } from "vitest";
import { ConfigProvider } from "../src/config/ConfigProvider.js";
import { EnvSchema } from "../src/config/schema.js";
import { ValidationError } from "../src/core/errors/index.js";

describe("EnvSchema", () => {
	it("空环境使用默认值", () => {
		const parsed = EnvSchema.parse({});

		expect(parsed).toEqual({ LOG_LEVEL: "warn", LOG_PRETTY: false, RANDROLL_MAX_DRAWS: 0 });
	});

	it("解析引擎与抽样上限", () => {
		const parsed = EnvSchema.parse({ RANDROLL_GENERATOR: "alea", RANDROLL_MAX_DRAWS: " 250 ", LOG_PRETTY: "true" });

		expect(parsed.RANDROLL_GENERATOR).toBe("alea");
		expect(parsed.RANDROLL_MAX_DRAWS).toBe(250);
		expect(parsed.LOG_PRETTY).toBe(true);
	});

	it.each(["abc", "-5", "2.5", ""])("非法抽样上限 %j 校验失败", (value) => {
		expect(EnvSchema.safeParse({ RANDROLL_MAX_DRAWS: value }).success).toBe(false);
	});
});

describe("ConfigProvider", () => {
	it("从传入的环境加载", () => {
		const provider = ConfigProvider.load({ LOG_LEVEL: "debug", RANDROLL_GENERATOR: "badrandom" });

		expect(provider.logLevel).toBe("debug");
		expect(provider.logPretty).toBe(false);
		expect(provider.runDefaults).toEqual({ generator: "badrandom", maxDraws: 0 });
	});

	it("非法日志级别抛出 ValidationError", () => {
		expect(() => ConfigProvider.load({ LOG_LEVEL: "loud" })).toThrow(ValidationError);
	});

	it("非法抽样上限抛出 ValidationError", () => {
		expect(() => ConfigProvider.load({ RANDROLL_MAX_DRAWS: "abc" })).toThrow(ValidationError);
		expect(() => ConfigProvider.load({ RANDROLL_MAX_DRAWS: "-5" })).toThrow(/RANDROLL_MAX_DRAWS/);
	});
});
