import { z } from "zod";

export const logLevelSchema = z.enum(["error", "warn", "info", "debug", "silent"]);

/** Non-negative integer given as a JSON number, a decimal string or a `0x` hex string. */
export const integerSchema = z
	.union([z.string().trim().min(1), z.number().int().nonnegative(), z.bigint()])
	.refine((val) => typeof val !== "string" || /^(0x[0-9a-fA-F]+|[0-9]+)$/.test(val), "Value is not an integer")
	.transform((val) => BigInt(val))
	.pipe(z.bigint().nonnegative());

export const participantIdSchema = integerSchema.refine((id) => id !== 0n, "Participant id must be non-zero");

const optionalInteger = z.preprocess((val) => (val === "" ? undefined : val), integerSchema.optional());

export const frostConfigSchema = z.object({
	LOG_LEVEL: logLevelSchema.optional(),
	FROST_GROUP_ORDER: optionalInteger,
	FROST_GENERATOR: optionalInteger,
});

export const sessionParticipantSchema = z.object({
	id: participantIdSchema,
	privateShare: integerSchema,
	hidingNonce: integerSchema,
	bindingNonce: integerSchema,
});

export const sessionFileSchema = z.object({
	message: z.string(),
	groupPublicKey: integerSchema,
	participants: z
		.array(sessionParticipantSchema)
		.min(1)
		.refine((participants) => new Set(participants.map((p) => p.id)).size === participants.length, {
			message: "Participant ids must be unique",
		}),
});

export type FrostConfig = z.infer<typeof frostConfigSchema>;
export type SessionFile = z.infer<typeof sessionFileSchema>;
