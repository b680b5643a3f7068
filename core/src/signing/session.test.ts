import { describe, expect, it, vi } from "vitest";
import { defaultContext as ctx, testLogger } from "../__tests__/config.js";
import { g } from "../frost/math.js";
import { createNonceCommitments } from "./nonces.js";
import { SigningSession } from "./session.js";
import { computeOwnResponse } from "./shares.js";

const MESSAGE = "hello 8";
const GROUP_COMMITMENT = 94855497682432160262293074457920650516699542868970290960595684192923801663596n;
const CHALLENGE = 4784819139786244349198411680186516504587558226846319750628001104163594722100n;
const RESPONSE = 71678938451945371465200159707784308493799179695328746168470551262416644218216n;

const setup = () => {
	const publicShare = g(ctx, 3n);
	const { nonces, commitment } = createNonceCommitments(ctx, 1n, 11n, 1n, publicShare);
	const session = new SigningSession(ctx, {
		message: MESSAGE,
		groupPublicKey: publicShare,
		commitments: [commitment],
		logger: testLogger,
	});
	return { session, nonces, commitment };
};

describe("SigningSession", () => {
	it("should compute group commitment and challenge", () => {
		const { session } = setup();
		expect(session.signers).toStrictEqual([1n]);
		expect(session.groupCommitment).toBe(GROUP_COMMITMENT);
		expect(session.challenge).toBe(CHALLENGE);
		expect(session.lagrangeCoefficient(1n)).toBe(1n);
		expect(session.bindingFactor(1n)).toBe(
			57324481032586638417604924667224758980036505014789786916586547949925860051905n,
		);
	});

	it("should aggregate valid signature shares", () => {
		const { session, nonces, commitment } = setup();
		const share = computeOwnResponse(
			ctx,
			commitment,
			3n,
			nonces,
			session.lagrangeCoefficient(1n),
			session.challenge,
			session.message,
		);
		expect(session.isComplete()).toBe(false);
		expect(session.registerSignatureShare(1n, share)).toBe(true);
		expect(session.isComplete()).toBe(true);
		expect(session.aggregate()).toStrictEqual({ groupCommitment: GROUP_COMMITMENT, response: RESPONSE });
	});

	it("should mark participants with invalid shares as misbehaving", () => {
		const { session } = setup();
		const warnSpy = vi.spyOn(testLogger, "warn");
		expect(session.registerSignatureShare(1n, RESPONSE + 1n)).toBe(false);
		expect(session.misbehaving()).toStrictEqual([1n]);
		expect(session.isComplete()).toBe(false);
		expect(warnSpy).toBeCalledWith("Invalid signature share from participant 1");
		warnSpy.mockRestore();
	});

	it("should mark a share outside the field as misbehaving", () => {
		const { session } = setup();
		const warnSpy = vi.spyOn(testLogger, "warn");
		// g^(q-1) = 1, so this share raises g to the same value as RESPONSE.
		expect(session.registerSignatureShare(1n, RESPONSE + ctx.q - 1n)).toBe(false);
		expect(session.misbehaving()).toStrictEqual([1n]);
		expect(session.isComplete()).toBe(false);
		expect(() => session.aggregate()).toThrow("Missing signature shares from participants 1");
		expect(warnSpy).toBeCalledWith("Invalid signature share from participant 1");
		warnSpy.mockRestore();
	});

	it("should mark a negative share as misbehaving", () => {
		const { session } = setup();
		expect(session.registerSignatureShare(1n, -1n)).toBe(false);
		expect(session.misbehaving()).toStrictEqual([1n]);
		expect(session.isComplete()).toBe(false);
	});

	it("should reject a second share for the same participant", () => {
		const { session } = setup();
		session.registerSignatureShare(1n, RESPONSE);
		expect(() => session.registerSignatureShare(1n, RESPONSE)).toThrow(
			"Signature share for participant 1 already registered",
		);
	});

	it("should reject shares of unknown participants", () => {
		const { session } = setup();
		expect(() => session.registerSignatureShare(2n, RESPONSE)).toThrow(
			"Participant 2 is not part of the signing session",
		);
		expect(() => session.lagrangeCoefficient(2n)).toThrow("Participant 2 is not part of the signing session");
	});

	it("should not aggregate with missing shares", () => {
		const { session } = setup();
		expect(() => session.aggregate()).toThrow("Missing signature shares from participants 1");
	});

	it("should reject invalid commitment sets", () => {
		const { commitment } = setup();
		const options = { message: MESSAGE, groupPublicKey: 343n };
		expect(() => new SigningSession(ctx, { ...options, commitments: [] })).toThrow(
			"Signing session requires at least one commitment",
		);
		expect(() => new SigningSession(ctx, { ...options, commitments: [commitment, commitment] })).toThrow(
			"Duplicate commitment for participant 1",
		);
		expect(() => new SigningSession(ctx, { ...options, commitments: [{ ...commitment, participantId: 0n }] })).toThrow(
			"Participant id must be non-zero",
		);
	});
});
