import { NonceReuseError } from "../frost/errors.js";
import { bindingInput, hashToScalar } from "../frost/hashes.js";
import { g, mulmod, powmod } from "../frost/math.js";
import type { GroupContext, GroupElement, ParticipantId, Scalar } from "../frost/types.js";

export type SecretNonceCommitments = {
	hidingNonce: Scalar; // d
	bindingNonce: Scalar; // e
};

export type PublicNonceCommitments = {
	hidingNonceCommitment: GroupElement; // D = g(d)
	bindingNonceCommitment: GroupElement; // E = g(e)
};

export type PublicCommitment = Readonly<
	PublicNonceCommitments & {
		participantId: ParticipantId;
		publicShare: GroupElement;
	}
>;

export type ParticipantShare = Readonly<{
	id: ParticipantId;
	privateShare: Scalar;
	publicShare: GroupElement;
}>;

export type BindingFactor = {
	id: ParticipantId;
	bindingFactor: Scalar;
};

/**
 * Single-use holder of a participant's secret nonce pair. The pair can only be read through
 * {@link SecretNonces.consume}, which burns it.
 */
export class SecretNonces {
	readonly participantId: ParticipantId;
	#nonces: SecretNonceCommitments | null;

	constructor(participantId: ParticipantId, nonces: SecretNonceCommitments) {
		this.participantId = participantId;
		this.#nonces = { ...nonces };
	}

	get consumed(): boolean {
		return this.#nonces === null;
	}

	consume(): SecretNonceCommitments {
		const nonces = this.#nonces;
		if (nonces === null) throw new NonceReuseError(this.participantId);
		this.#nonces = null;
		return nonces;
	}
}

const assertParticipantId = (id: ParticipantId): void => {
	if (id === 0n) throw Error("Participant id must be non-zero");
};

export const createParticipantShare = (
	ctx: GroupContext,
	id: ParticipantId,
	privateShare: Scalar,
): ParticipantShare => {
	assertParticipantId(id);
	const share = ctx.Fq.create(privateShare);
	return Object.freeze({ id, privateShare: share, publicShare: g(ctx, share) });
};

export const createNonceCommitments = (
	ctx: GroupContext,
	participantId: ParticipantId,
	hidingNonce: Scalar,
	bindingNonce: Scalar,
	publicShare: GroupElement,
): { nonces: SecretNonces; commitment: PublicCommitment } => {
	assertParticipantId(participantId);
	const d = ctx.Fq.create(hidingNonce);
	const e = ctx.Fq.create(bindingNonce);
	return {
		nonces: new SecretNonces(participantId, { hidingNonce: d, bindingNonce: e }),
		commitment: Object.freeze({
			participantId,
			hidingNonceCommitment: g(ctx, d),
			bindingNonceCommitment: g(ctx, e),
			publicShare,
		}),
	};
};

export const bindingFactor = (ctx: GroupContext, commitment: PublicCommitment, message: string): Scalar => {
	return hashToScalar(ctx, bindingInput(commitment, message));
};

export const bindingFactors = (
	ctx: GroupContext,
	commitments: readonly PublicCommitment[],
	message: string,
): BindingFactor[] => {
	return commitments.map((commitment) => ({
		id: commitment.participantId,
		bindingFactor: bindingFactor(ctx, commitment, message),
	}));
};

export const groupCommitmentShare = (
	ctx: GroupContext,
	nonceCommitments: PublicNonceCommitments,
	bindingFactor: Scalar,
): GroupElement => {
	const factor = powmod(ctx, nonceCommitments.bindingNonceCommitment, bindingFactor);
	return mulmod(ctx, nonceCommitments.hidingNonceCommitment, factor);
};
