import { type SwitchyardError, toError } from "./errors";

/** Discriminated union representing either success or failure */
export type Result<T, E = SwitchyardError> = { ok: true; value: T } | { ok: false; error: E };

/** Create a successful Result */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

/** Create a failed Result */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** Settle a promise into a Result; a non-Error rejection is wrapped. */
export async function fromPromise<T>(promise: Promise<T>): Promise<Result<T, Error>> {
	try {
		return Ok(await promise);
	} catch (error) {
		return Err(toError(error));
	}
}
