import { promises as fs } from "node:fs";
import dotenv from "dotenv";
import { z } from "zod";
import { signRound } from "../signing/round.js";
import { sessionFileSchema } from "../types/schemas.js";
import { loadConfig } from "../utils/config.js";
import { toJson } from "../utils/json.js";
import { createLogger } from "../utils/logging.js";

dotenv.config({ quiet: true });

const main = async (): Promise<void> => {
	const { logLevel, context } = loadConfig(process.env);
	const logger = createLogger({ level: logLevel, pretty: process.stdout.isTTY });

	const file = process.argv[2];
	if (file === undefined) {
		logger.error("Usage: sign <session.json>");
		process.exitCode = 1;
		return;
	}

	const result = sessionFileSchema.safeParse(JSON.parse(await fs.readFile(file, "utf-8")));
	if (!result.success) {
		logger.error(`Invalid session file: ${JSON.stringify(z.treeifyError(result.error))}`);
		process.exitCode = 1;
		return;
	}

	console.log(toJson(signRound(context, result.data, logger)));
};

main().catch((err: unknown) => {
	console.error(err);
	process.exitCode = 1;
});
