import { g, mulmod, powmod } from "../frost/math.js";
import type { GroupContext, GroupElement, ParticipantId, Scalar } from "../frost/types.js";
import { groupChallenge, lagrangeCoefficient } from "./group.js";
import { bindingFactor, groupCommitmentShare, type PublicCommitment } from "./nonces.js";
import { type AggregateSignature, lagrangeChallenge } from "./shares.js";

export type ParticipantVerification = {
	participantId: ParticipantId;
	valid: boolean;
};

/** `r_i * Y_i^(c * lambda_i)`, the value `g^z_i` is expected to match. */
const expectedCommitment = (
	ctx: GroupContext,
	commitment: PublicCommitment,
	message: string,
	challenge: Scalar,
	coefficient: Scalar,
): GroupElement => {
	const r = groupCommitmentShare(ctx, commitment, bindingFactor(ctx, commitment, message));
	const pki = powmod(ctx, commitment.publicShare, lagrangeChallenge(ctx, coefficient, challenge));
	return mulmod(ctx, r, pki);
};

/**
 * Compares every participant's commitment term against `g^response`.
 *
 * Each term is checked against the same response. With more than one participant a valid
 * aggregate response therefore fails this check; {@link verifySignature} checks the
 * aggregate relation instead.
 */
export const participantVerificationResults = (
	ctx: GroupContext,
	commitments: readonly PublicCommitment[],
	message: string,
	response: Scalar,
	challenge: Scalar,
	signers: readonly ParticipantId[] = commitments.map((c) => c.participantId),
): ParticipantVerification[] => {
	const gz = g(ctx, response);
	return commitments.map((commitment) => {
		const coefficient = lagrangeCoefficient(ctx, commitment.participantId, signers);
		return {
			participantId: commitment.participantId,
			valid: expectedCommitment(ctx, commitment, message, challenge, coefficient) === gz,
		};
	});
};

export const verifyParticipants = (
	ctx: GroupContext,
	commitments: readonly PublicCommitment[],
	message: string,
	response: Scalar,
	challenge: Scalar,
	signers?: readonly ParticipantId[],
): boolean => {
	return participantVerificationResults(ctx, commitments, message, response, challenge, signers).every(
		({ valid }) => valid,
	);
};

/** Shares are canonical field elements; `z` and `z + (q - 1)` raise `g` to the same value. */
export const isCanonicalScalar = (ctx: GroupContext, value: bigint): boolean => value >= 0n && value < ctx.q;

export const verifySignatureShare = (
	ctx: GroupContext,
	commitment: PublicCommitment,
	signatureShare: Scalar,
	challenge: Scalar,
	lagrangeCoefficient: Scalar,
	message: string,
): boolean => {
	if (!isCanonicalScalar(ctx, signatureShare)) return false;
	return g(ctx, signatureShare) === expectedCommitment(ctx, commitment, message, challenge, lagrangeCoefficient);
};

export const verifySignature = (
	ctx: GroupContext,
	signature: AggregateSignature,
	groupPublicKey: GroupElement,
	message: string,
): boolean => {
	const challenge = groupChallenge(ctx, signature.groupCommitment, groupPublicKey, message);
	const expected = mulmod(ctx, signature.groupCommitment, powmod(ctx, groupPublicKey, challenge));
	return g(ctx, signature.response) === expected;
};
