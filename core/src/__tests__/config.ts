import { createGroupContext, defaultGroupContext } from "../frost/context.js";
import { createLogger } from "../utils/logging.js";

const { FROST_TEST_VERBOSE } = process.env;

export const silentLogger = createLogger({ level: "silent" });
export const testLogger = createLogger({
	level: FROST_TEST_VERBOSE === "true" || FROST_TEST_VERBOSE === "1" ? "debug" : "silent",
	pretty: true,
});

// 5 is a primitive root modulo 23.
export const smallContext = createGroupContext({ q: 23n, g: 5n });
export const defaultContext = defaultGroupContext();
