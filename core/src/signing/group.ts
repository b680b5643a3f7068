import { challengeInput, hashToScalar } from "../frost/hashes.js";
import { divmod, mulmod, submod } from "../frost/math.js";
import type { GroupContext, GroupElement, ParticipantId, Scalar } from "../frost/types.js";
import { bindingFactor, groupCommitmentShare, type PublicCommitment } from "./nonces.js";

export type GroupCommitmentAndChallenge = {
	groupCommitment: GroupElement;
	challenge: Scalar;
};

export const groupCommitment = (
	ctx: GroupContext,
	commitments: readonly PublicCommitment[],
	message: string,
): GroupElement => {
	return commitments.reduce(
		(acc, commitment) =>
			mulmod(ctx, acc, groupCommitmentShare(ctx, commitment, bindingFactor(ctx, commitment, message))),
		1n,
	);
};

export const groupChallenge = (
	ctx: GroupContext,
	groupCommitment: GroupElement,
	groupPublicKey: GroupElement,
	message: string,
): Scalar => {
	return hashToScalar(ctx, challengeInput(groupCommitment, groupPublicKey, message));
};

export const groupCommitmentAndChallenge = (
	ctx: GroupContext,
	commitments: readonly PublicCommitment[],
	message: string,
	groupPublicKey: GroupElement,
): GroupCommitmentAndChallenge => {
	const commitment = groupCommitment(ctx, commitments, message);
	return {
		groupCommitment: commitment,
		challenge: groupChallenge(ctx, commitment, groupPublicKey, message),
	};
};

/**
 * Lagrange coefficient of `id` at zero over the identifiers of the signing set:
 * the product of `j / (j - id)` over every other signer `j`.
 */
export const lagrangeCoefficient = (ctx: GroupContext, id: ParticipantId, signers: readonly ParticipantId[]): Scalar => {
	const others = signers.filter((signer) => signer !== id);
	const numerator = others.reduce((acc, j) => mulmod(ctx, acc, j), 1n);
	const denominator = others.reduce((acc, j) => mulmod(ctx, acc, submod(ctx, j, id)), 1n);
	return divmod(ctx, numerator, denominator);
};

/** Conventional `1..count` numbering for sessions that only know their size. */
export const participantIds = (count: number): ParticipantId[] => {
	if (!Number.isSafeInteger(count) || count < 0) {
		throw Error(`Invalid participant count ${count}`);
	}
	return Array.from({ length: count }, (_, i) => BigInt(i + 1));
};
