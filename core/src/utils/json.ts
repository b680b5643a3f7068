export function jsonReplacer(_key: string, value: unknown): unknown {
	if (typeof value === "bigint") {
		return value.toString();
	}
	// Error properties are not enumerable and would serialize to `{}`.
	if (value instanceof Error) {
		return {
			name: value.name,
			message: value.message,
			cause: value.cause,
		};
	}
	return value;
}

export const toJson = (value: unknown): string => JSON.stringify(value, jsonReplacer, 2);
