import winston from "winston";
import { withDefaults } from "./config.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "silent";

export type Logger = {
	error(msg: unknown): void;
	warn(msg: unknown): void;
	info(msg: unknown): void;
	debug(msg: unknown): void;
};

export type LoggerOptions = {
	level?: LogLevel;
	pretty?: boolean;
};

const format = (msg: unknown): string => {
	if (msg instanceof Error) return msg.stack ?? `${msg.name}: ${msg.message}`;
	if (typeof msg === "string") return msg;
	return String(msg);
};

export const createLogger = (options: LoggerOptions = {}): Logger => {
	const defaults: Required<LoggerOptions> = { level: "info", pretty: false };
	const { level, pretty } = withDefaults(options, defaults);
	const logger = winston.createLogger({
		level: level === "silent" ? "error" : level,
		silent: level === "silent",
		format: pretty
			? winston.format.combine(
					winston.format.colorize(),
					winston.format.timestamp(),
					winston.format.printf((info) => `${info.timestamp} ${info.level}: ${info.message}`),
				)
			: winston.format.combine(winston.format.timestamp(), winston.format.json()),
		transports: [new winston.transports.Console()],
	});
	return {
		error: (msg) => logger.error(format(msg)),
		warn: (msg) => logger.warn(format(msg)),
		info: (msg) => logger.info(format(msg)),
		debug: (msg) => logger.debug(format(msg)),
	};
};
