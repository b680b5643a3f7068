import { Field } from "@noble/curves/abstract/modular.js";
import { secp256k1 } from "@noble/curves/secp256k1.js";
import { z } from "zod";
import type { GroupContext, GroupParameters } from "./types.js";

export const DEFAULT_GROUP_ORDER = secp256k1.Point.CURVE().n;
export const DEFAULT_GENERATOR = 7n;

export const groupParametersSchema = z
	.object({
		q: z.bigint().min(3n, "Group order must be at least 3"),
		g: z.bigint().min(2n, "Generator must be greater than 1"),
	})
	.refine(({ q, g }) => g < q, { message: "Generator must be smaller than the group order", path: ["g"] })
	// Fermat: holds for every prime modulus, rejects most composites.
	.refine(({ q, g }) => q < 3n || Field(q).pow(g, q - 1n) === 1n, {
		message: "Group order is not prime for the given generator",
		path: ["q"],
	});

export const createGroupContext = (parameters: GroupParameters): GroupContext => {
	const { q, g } = groupParametersSchema.parse(parameters);
	return Object.freeze({ q, g, Fq: Field(q) });
};

export const defaultGroupContext = (): GroupContext =>
	createGroupContext({ q: DEFAULT_GROUP_ORDER, g: DEFAULT_GENERATOR });
