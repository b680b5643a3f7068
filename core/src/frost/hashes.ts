import { sha256 } from "@noble/hashes/sha2.js";
import { bytesToHex, hexToBigInt, isHex, stringToBytes } from "viem";
import { FrostArithmeticError } from "./errors.js";
import type { GroupContext, GroupElement, ParticipantId, Scalar } from "./types.js";

export const FIELD_SEPARATOR = "::::";
export const COMMITMENT_SEPARATOR = "::";

export type EncodableCommitment = {
	participantId: ParticipantId;
	hidingNonceCommitment: GroupElement;
	bindingNonceCommitment: GroupElement;
};

/**
 * Canonical `<id>::<D>::<E>` form of a nonce commitment. Participants exchanging commitments
 * must reproduce it exactly, since it is part of the binding factor preimage.
 */
export const encodeCommitment = (commitment: EncodableCommitment): string =>
	[commitment.participantId, commitment.hidingNonceCommitment, commitment.bindingNonceCommitment]
		.map((value) => value.toString(10))
		.join(COMMITMENT_SEPARATOR);

export const bindingInput = (commitment: EncodableCommitment, message: string): string =>
	[commitment.participantId.toString(10), message, encodeCommitment(commitment)].join(FIELD_SEPARATOR);

export const challengeInput = (
	groupCommitment: GroupElement,
	groupPublicKey: GroupElement,
	message: string,
): string => [groupCommitment.toString(10), groupPublicKey.toString(10), message].join(FIELD_SEPARATOR);

export const digestToScalar = (ctx: GroupContext, digest: string): Scalar => {
	if (digest.length <= 2 || !isHex(digest, { strict: true })) {
		throw new FrostArithmeticError("invalid_digest", `Digest "${digest}" is not a hex encoded integer`);
	}
	return ctx.Fq.create(hexToBigInt(digest));
};

export const hashToScalar = (ctx: GroupContext, input: string): Scalar => {
	return digestToScalar(ctx, bytesToHex(sha256(stringToBytes(input))));
};
