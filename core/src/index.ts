export {
	createGroupContext,
	DEFAULT_GENERATOR,
	DEFAULT_GROUP_ORDER,
	defaultGroupContext,
	groupParametersSchema,
} from "./frost/context.js";
export { type ArithmeticFailure, FrostArithmeticError, NonceReuseError } from "./frost/errors.js";
export {
	bindingInput,
	COMMITMENT_SEPARATOR,
	challengeInput,
	digestToScalar,
	encodeCommitment,
	FIELD_SEPARATOR,
	hashToScalar,
} from "./frost/hashes.js";
export { addmod, divmod, g, mulmod, powmod, submod } from "./frost/math.js";
export type { GroupContext, GroupElement, GroupParameters, ParticipantId, Scalar } from "./frost/types.js";
export {
	type GroupCommitmentAndChallenge,
	groupChallenge,
	groupCommitment,
	groupCommitmentAndChallenge,
	lagrangeCoefficient,
	participantIds,
} from "./signing/group.js";
export {
	type BindingFactor,
	bindingFactor,
	bindingFactors,
	createNonceCommitments,
	createParticipantShare,
	groupCommitmentShare,
	type ParticipantShare,
	type PublicCommitment,
	type PublicNonceCommitments,
	type SecretNonceCommitments,
	SecretNonces,
} from "./signing/nonces.js";
export { type RoundResult, signRound } from "./signing/round.js";
export { SigningSession, type SigningSessionOptions } from "./signing/session.js";
export {
	type AggregateSignature,
	aggregateSignature,
	computeAggregateResponse,
	computeOwnResponse,
	lagrangeChallenge,
} from "./signing/shares.js";
export {
	isCanonicalScalar,
	type ParticipantVerification,
	participantVerificationResults,
	verifyParticipants,
	verifySignature,
	verifySignatureShare,
} from "./signing/verify.js";
export { type FrostConfig, frostConfigSchema, type SessionFile, sessionFileSchema } from "./types/schemas.js";
export { loadConfig, type SigningConfig, withDefaults } from "./utils/config.js";
export { jsonReplacer, toJson } from "./utils/json.js";
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from "./utils/logging.js";
