import { describe, expect, it, vi } from "vitest";
import winston from "winston";
import { createLogger } from "./logging.js";

const createWithSpy = (...args: Parameters<typeof createLogger>) => {
	const spy = vi.spyOn(winston, "createLogger");
	const logger = createLogger(...args);
	const instance = spy.mock.results[0].value;
	return { spy, logger, instance };
};

describe("createLogger", () => {
	it("should forward messages to winston", () => {
		const { spy, logger, instance } = createWithSpy({ level: "silent" });
		const info = vi.spyOn(instance, "info");
		const debug = vi.spyOn(instance, "debug");
		const error = vi.spyOn(instance, "error");
		logger.info("hello");
		logger.debug(42n);
		logger.error(new Error("boom"));
		expect(info).toBeCalledWith("hello");
		expect(debug).toBeCalledWith("42");
		expect(error.mock.calls[0][0]).toMatch(/^Error: boom\n/);
		spy.mockRestore();
	});

	it("should silence all output", () => {
		const { spy } = createWithSpy({ level: "silent" });
		expect(spy).toHaveBeenCalledWith(expect.objectContaining({ level: "error", silent: true }));
		spy.mockRestore();
	});

	it("should default to info", () => {
		const { spy } = createWithSpy();
		expect(spy).toHaveBeenCalledWith(expect.objectContaining({ level: "info", silent: false }));
		spy.mockRestore();
	});
});
