import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { configureLogger, createLogger, sanitize } from "./logger";

describe("createLogger", () => {
	const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

	beforeEach(() => {
		logSpy.mockClear();
	});

	afterEach(() => {
		configureLogger(process.env);
	});

	afterAll(() => {
		logSpy.mockRestore();
	});

	it("writes one JSON line with module and event", () => {
		configureLogger({ LOG_LEVEL: "debug" });
		createLogger("indicators").info("computed", { bars: 60 });

		expect(logSpy).toHaveBeenCalledTimes(1);
		const line = JSON.parse(String(logSpy.mock.calls[0][0]));
		expect(line.level).toBe("info");
		expect(line.module).toBe("indicators");
		expect(line.event).toBe("computed");
		expect(line.bars).toBe(60);
		expect(typeof line.ts).toBe("string");
	});

	it("drops events below LOG_LEVEL", () => {
		configureLogger({ LOG_LEVEL: "warn" });
		const logger = createLogger("data");
		logger.info("ignored");
		logger.debug("ignored");
		logger.warn("kept");

		expect(logSpy).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(logSpy.mock.calls[0][0])).event).toBe("kept");
	});

	it("filters by LOG_MODULE", () => {
		configureLogger({ LOG_LEVEL: "info", LOG_MODULE: "insights, report" });
		createLogger("data").info("skipped");
		createLogger("report").info("kept");

		expect(logSpy).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(logSpy.mock.calls[0][0])).module).toBe("report");
	});
});

describe("sanitize", () => {
	it("serialises errors, dates and circular references", () => {
		const circular: Record<string, unknown> = { name: "loop" };
		circular.self = circular;

		const clean = sanitize({
			level: "error",
			event: "failed",
			module: "test",
			at: new Date(Date.UTC(2025, 0, 2)),
			error: new Error("boom"),
			big: BigInt(7),
			ratio: Number.NaN,
			circular,
		});

		expect(clean.at).toBe("2025-01-02T00:00:00.000Z");
		expect(clean.error).toMatchObject({ name: "Error", message: "boom" });
		expect(clean.big).toBe("7");
		expect(clean.ratio).toBe("NaN");
		expect(clean.circular).toEqual({ name: "loop", self: "[circular]" });
	});
});
