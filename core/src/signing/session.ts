import type { GroupContext, GroupElement, ParticipantId, Scalar } from "../frost/types.js";
import type { Logger } from "../utils/logging.js";
import { groupCommitmentAndChallenge, lagrangeCoefficient } from "./group.js";
import { bindingFactor, type PublicCommitment } from "./nonces.js";
import { type AggregateSignature, aggregateSignature } from "./shares.js";
import { verifySignatureShare } from "./verify.js";

export type SigningSessionOptions = {
	message: string;
	groupPublicKey: GroupElement;
	commitments: readonly PublicCommitment[];
	logger?: Logger;
};

/**
 * Collects the signature shares of one signing round over a fixed commitment set. Every
 * share is checked against its participant's commitment before it counts towards the
 * aggregate.
 */
export class SigningSession {
	#ctx: GroupContext;
	#commitments: Map<ParticipantId, PublicCommitment>;
	#shares = new Map<ParticipantId, Scalar>();
	#misbehaving = new Set<ParticipantId>();
	#logger?: Logger;

	readonly message: string;
	readonly groupPublicKey: GroupElement;
	readonly signers: readonly ParticipantId[];
	readonly groupCommitment: GroupElement;
	readonly challenge: Scalar;

	constructor(ctx: GroupContext, { message, groupPublicKey, commitments, logger }: SigningSessionOptions) {
		if (commitments.length === 0) throw Error("Signing session requires at least one commitment");
		const byId = new Map<ParticipantId, PublicCommitment>();
		for (const commitment of commitments) {
			if (commitment.participantId === 0n) throw Error("Participant id must be non-zero");
			if (byId.has(commitment.participantId))
				throw Error(`Duplicate commitment for participant ${commitment.participantId}`);
			byId.set(commitment.participantId, commitment);
		}
		this.#ctx = ctx;
		this.#commitments = byId;
		this.#logger = logger;
		this.message = message;
		this.groupPublicKey = groupPublicKey;
		this.signers = Object.freeze([...byId.keys()]);
		const { groupCommitment, challenge } = groupCommitmentAndChallenge(ctx, commitments, message, groupPublicKey);
		this.groupCommitment = groupCommitment;
		this.challenge = challenge;
		this.#logger?.debug(`Signing session for ${this.signers.length} signers with group commitment ${groupCommitment}`);
	}

	private commitment(id: ParticipantId): PublicCommitment {
		const commitment = this.#commitments.get(id);
		if (commitment === undefined) throw Error(`Participant ${id} is not part of the signing session`);
		return commitment;
	}

	lagrangeCoefficient(id: ParticipantId): Scalar {
		this.commitment(id);
		return lagrangeCoefficient(this.#ctx, id, this.signers);
	}

	bindingFactor(id: ParticipantId): Scalar {
		return bindingFactor(this.#ctx, this.commitment(id), this.message);
	}

	/**
	 * Checks and records the share of a participant. Returns whether the share was valid;
	 * invalid shares, including values outside `[0, q)`, mark the participant as misbehaving
	 * and are not recorded.
	 */
	registerSignatureShare(id: ParticipantId, signatureShare: Scalar): boolean {
		const commitment = this.commitment(id);
		if (this.#shares.has(id) || this.#misbehaving.has(id)) {
			throw Error(`Signature share for participant ${id} already registered`);
		}
		const valid = verifySignatureShare(
			this.#ctx,
			commitment,
			signatureShare,
			this.challenge,
			this.lagrangeCoefficient(id),
			this.message,
		);
		if (!valid) {
			this.#misbehaving.add(id);
			this.#logger?.warn(`Invalid signature share from participant ${id}`);
			return false;
		}
		this.#shares.set(id, signatureShare);
		this.#logger?.debug(`Registered signature share from participant ${id}`);
		return true;
	}

	misbehaving(): ParticipantId[] {
		return [...this.#misbehaving];
	}

	isComplete(): boolean {
		return this.#shares.size === this.signers.length;
	}

	aggregate(): AggregateSignature {
		const missing = this.signers.filter((id) => !this.#shares.has(id));
		if (missing.length > 0) {
			throw Error(`Missing signature shares from participants ${missing.join(", ")}`);
		}
		const signature = aggregateSignature(this.#ctx, this.groupCommitment, [...this.#shares.values()]);
		this.#logger?.info(`Aggregated ${this.#shares.size} signature shares`);
		return signature;
	}
}
