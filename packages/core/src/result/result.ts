import type { TaplineError } from "./errors";

/** Discriminated union representing either success or failure */
export type Result<T, E = TaplineError> = { ok: true; value: T } | { ok: false; error: E };

/** Create a successful Result */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

/** Create a failed Result */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** Wrap a Promise into a Result, coercing rejections into Error instances */
export async function fromPromise<T>(promise: Promise<T>): Promise<Result<T, Error>> {
	try {
		const value = await promise;
		return Ok(value);
	} catch (error) {
		return Err(error instanceof Error ? error : new Error(String(error)));
	}
}
