/**
 * Typed result for operations that may fail without throwing.
 *
 * Used at the Discord boundary, where a failed cosmetic update (an edit on a
 * deleted message, an expired interaction token) must not take the form down.
 *
 * ```ts
 * const res = await attempt(() => ctx.editOrReply(body));
 * if (res.isErr()) logger.warn("edit failed", res.error);
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
    readonly ok = true;
    readonly err = false;

    constructor(public readonly value: T) { }

    isOk(): this is Ok<T, E> {
        return true;
    }

    isErr(): this is Err<T, E> {
        return false;
    }

    inspectErr(_fn: (error: E) => void): Result<T, E> {
        return this;
    }
}

export class Err<T, E> {
    readonly ok = false;
    readonly err = true;

    constructor(public readonly error: E) { }

    isOk(): this is Ok<T, E> {
        return false;
    }

    isErr(): this is Err<T, E> {
        return true;
    }

    inspectErr(fn: (error: E) => void): Result<T, E> {
        fn(this.error);
        return this;
    }
}

/** Wraps a value in a successful result. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Wraps an error in a failed result. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);

/**
 * Runs an async call and captures a rejection as `Err`.
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
    try {
        return OkResult(await fn());
    } catch (error) {
        return ErrResult(error instanceof Error ? error : new Error(String(error)));
    }
}
