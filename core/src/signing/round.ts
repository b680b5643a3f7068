import type { GroupContext, GroupElement, ParticipantId, Scalar } from "../frost/types.js";
import type { SessionFile } from "../types/schemas.js";
import type { Logger } from "../utils/logging.js";
import { createNonceCommitments, createParticipantShare } from "./nonces.js";
import { SigningSession } from "./session.js";
import { type AggregateSignature, computeOwnResponse } from "./shares.js";
import { verifyParticipants, verifySignature } from "./verify.js";

export type RoundResult = {
	groupCommitment: GroupElement;
	challenge: Scalar;
	responses: Scalar[];
	misbehaving: ParticipantId[];
	signature?: AggregateSignature;
	participantsVerified: boolean;
	signatureVerified: boolean;
};

/**
 * Runs a complete signing round for participants whose secret material is all known locally,
 * as described by a session file. Meant for tooling and tests, not for deployments where
 * each participant signs on its own host.
 */
export const signRound = (ctx: GroupContext, session: SessionFile, logger?: Logger): RoundResult => {
	const participants = session.participants.map((participant) => {
		const share = createParticipantShare(ctx, participant.id, participant.privateShare);
		const { nonces, commitment } = createNonceCommitments(
			ctx,
			share.id,
			participant.hidingNonce,
			participant.bindingNonce,
			share.publicShare,
		);
		return { share, nonces, commitment };
	});
	const commitments = participants.map((p) => p.commitment);
	const signing = new SigningSession(ctx, {
		message: session.message,
		groupPublicKey: session.groupPublicKey,
		commitments,
		logger,
	});

	const responses = participants.map(({ share, nonces, commitment }) => {
		const response = computeOwnResponse(
			ctx,
			commitment,
			share.privateShare,
			nonces,
			signing.lagrangeCoefficient(share.id),
			signing.challenge,
			signing.message,
		);
		signing.registerSignatureShare(share.id, response);
		return response;
	});

	const signature = signing.isComplete() ? signing.aggregate() : undefined;
	return {
		groupCommitment: signing.groupCommitment,
		challenge: signing.challenge,
		responses,
		misbehaving: signing.misbehaving(),
		signature,
		participantsVerified:
			signature !== undefined &&
			verifyParticipants(ctx, commitments, signing.message, signature.response, signing.challenge),
		signatureVerified:
			signature !== undefined && verifySignature(ctx, signature, signing.groupPublicKey, signing.message),
	};
};
