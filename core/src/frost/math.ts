import { FrostArithmeticError } from "./errors.js";
import type { GroupContext, GroupElement, Scalar } from "./types.js";

export const addmod = (ctx: GroupContext, lhs: bigint, rhs: bigint): bigint => {
	return ctx.Fq.add(ctx.Fq.create(lhs), ctx.Fq.create(rhs));
};

export const submod = (ctx: GroupContext, lhs: bigint, rhs: bigint): bigint => {
	return ctx.Fq.sub(ctx.Fq.create(lhs), ctx.Fq.create(rhs));
};

export const mulmod = (ctx: GroupContext, lhs: bigint, rhs: bigint): bigint => {
	return ctx.Fq.mul(ctx.Fq.create(lhs), ctx.Fq.create(rhs));
};

export const divmod = (ctx: GroupContext, lhs: bigint, rhs: bigint): bigint => {
	const divisor = ctx.Fq.create(rhs);
	if (ctx.Fq.is0(divisor)) {
		throw new FrostArithmeticError("non_invertible", `${rhs} has no inverse modulo ${ctx.q}`);
	}
	try {
		return ctx.Fq.div(ctx.Fq.create(lhs), divisor);
	} catch (error: unknown) {
		throw new FrostArithmeticError("non_invertible", `${rhs} has no inverse modulo ${ctx.q}`, { cause: error });
	}
};

export const powmod = (ctx: GroupContext, base: bigint, exponent: bigint): bigint => {
	if (exponent < 0n) {
		throw new FrostArithmeticError("negative_exponent", `Negative exponent ${exponent} is not supported`);
	}
	// The field returns the base untouched for an exponent of one, so reduce it first.
	return ctx.Fq.pow(ctx.Fq.create(base), exponent);
};

export const g = (ctx: GroupContext, scalar: Scalar): GroupElement => {
	return powmod(ctx, ctx.g, scalar);
};
