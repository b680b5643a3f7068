import { addmod, mulmod } from "../frost/math.js";
import type { GroupContext, GroupElement, Scalar } from "../frost/types.js";
import { bindingFactor, type PublicCommitment, type SecretNonces } from "./nonces.js";

export type AggregateSignature = Readonly<{
	groupCommitment: GroupElement;
	response: Scalar;
}>;

export const lagrangeChallenge = (ctx: GroupContext, lagrangeCoefficient: Scalar, challenge: Scalar): Scalar =>
	mulmod(ctx, challenge, lagrangeCoefficient);

/**
 * Signature share `z_i = d_i + e_i * rho_i + lambda_i * s_i * c` of the participant owning
 * `ownCommitment`. Burns `nonces`: a nonce pair signs exactly one message.
 */
export const computeOwnResponse = (
	ctx: GroupContext,
	ownCommitment: PublicCommitment,
	privateShare: Scalar,
	nonces: SecretNonces,
	lagrangeCoefficient: Scalar,
	challenge: Scalar,
	message: string,
): Scalar => {
	if (nonces.participantId !== ownCommitment.participantId) {
		throw Error(
			`Nonces of participant ${nonces.participantId} cannot sign for participant ${ownCommitment.participantId}`,
		);
	}
	const rho = bindingFactor(ctx, ownCommitment, message);
	const { hidingNonce, bindingNonce } = nonces.consume();
	return addmod(
		ctx,
		hidingNonce,
		addmod(
			ctx,
			mulmod(ctx, bindingNonce, rho),
			mulmod(ctx, lagrangeChallenge(ctx, lagrangeCoefficient, challenge), privateShare),
		),
	);
};

export const computeAggregateResponse = (ctx: GroupContext, responses: readonly Scalar[]): Scalar => {
	return responses.reduce((acc, response) => addmod(ctx, acc, response), 0n);
};

export const aggregateSignature = (
	ctx: GroupContext,
	groupCommitment: GroupElement,
	responses: readonly Scalar[],
): AggregateSignature => {
	return Object.freeze({
		groupCommitment: ctx.Fq.create(groupCommitment),
		response: computeAggregateResponse(ctx, responses),
	});
};
