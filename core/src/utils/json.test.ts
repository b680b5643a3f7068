import { describe, expect, it } from "vitest";
import { FrostArithmeticError } from "../frost/errors.js";
import { jsonReplacer, toJson } from "./json.js";

const json = (value: unknown) => JSON.stringify(value, jsonReplacer, 2);

describe("jsonReplacer", () => {
	it("should serialize big integers", () => {
		expect(json(1337n)).toEqual(json("1337"));
		expect(json({ z: [1n, 2n] })).toEqual(json({ z: ["1", "2"] }));
	});

	it("should serialize errors", () => {
		const cause = new FrostArithmeticError("non_invertible", "0 has no inverse modulo 23");
		const err = new Error("hello", { cause });
		expect(json(err)).toEqual(
			json({
				name: "Error",
				message: "hello",
				cause: {
					name: "FrostArithmeticError",
					message: "0 has no inverse modulo 23",
				},
			}),
		);
	});

	it("should pretty print", () => {
		expect(toJson({ a: 1n })).toBe('{\n  "a": "1"\n}');
	});
});
