import type { Prettify } from "viem";
import { createGroupContext, DEFAULT_GENERATOR, DEFAULT_GROUP_ORDER } from "../frost/context.js";
import type { GroupContext } from "../frost/types.js";
import { frostConfigSchema } from "../types/schemas.js";
import type { LogLevel } from "./logging.js";

type MergeDefaults<T extends object, D extends object> = Prettify<{
	[K in keyof T | keyof D]: K extends keyof T
		? undefined extends T[K]
			? // Optional in T: take T's value type or the default's
				Exclude<T[K], undefined> | (K extends keyof D ? D[K] : never)
			: T[K]
		: K extends keyof D
			? D[K]
			: never;
}>;

export const withDefaults = <T extends Record<string, unknown>, D extends Record<string, unknown>>(
	config: T,
	defaultValues: D,
): MergeDefaults<T, D> => {
	const merged: Record<string, unknown> = { ...defaultValues };
	for (const key in config) {
		const value = config[key];
		if (value !== undefined) {
			merged[key] = value;
		}
	}
	return merged as MergeDefaults<T, D>;
};

export type SigningConfig = {
	logLevel: LogLevel;
	context: GroupContext;
};

/**
 * Reads the log level and group parameters from an environment map such as `process.env`.
 * Throws the zod error when a variable is malformed.
 */
export const loadConfig = (env: Record<string, string | undefined>): SigningConfig => {
	const parsed = frostConfigSchema.parse(env);
	const defaults: { logLevel: LogLevel; q: bigint; g: bigint } = {
		logLevel: "info",
		q: DEFAULT_GROUP_ORDER,
		g: DEFAULT_GENERATOR,
	};
	const settings = withDefaults(
		{ logLevel: parsed.LOG_LEVEL, q: parsed.FROST_GROUP_ORDER, g: parsed.FROST_GENERATOR },
		defaults,
	);
	return {
		logLevel: settings.logLevel,
		context: createGroupContext({ q: settings.q, g: settings.g }),
	};
};
