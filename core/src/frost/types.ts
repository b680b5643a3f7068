import type { IField } from "@noble/curves/abstract/modular.js";

export type ParticipantId = bigint;

/** Integer in `[0, q)` used as an exponent or field element. */
export type Scalar = bigint;

/** Integer in `[1, q)` obtained by exponentiating the generator. */
export type GroupElement = bigint;

export type GroupParameters = {
	q: bigint;
	g: bigint;
};

export type GroupContext = Readonly<
	GroupParameters & {
		Fq: IField<bigint>;
	}
>;
