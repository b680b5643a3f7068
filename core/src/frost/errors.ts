export type ArithmeticFailure = "non_invertible" | "negative_exponent" | "invalid_digest";

export class FrostArithmeticError extends Error {
	readonly reason: ArithmeticFailure;

	constructor(reason: ArithmeticFailure, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "FrostArithmeticError";
		this.reason = reason;
	}
}

/**
 * Raised when a secret nonce pair is read a second time. Reusing a nonce pair for two
 * signatures leaks the private share.
 */
export class NonceReuseError extends Error {
	readonly participantId: bigint;

	constructor(participantId: bigint) {
		super(`Nonces for participant ${participantId} have been already burned`);
		this.name = "NonceReuseError";
		this.participantId = participantId;
	}
}
