type Outcome<T, E> = { ok: true; value: T } | { ok: false; error: E };

export class Result<T, E = string> {
  public readonly isSuccess: boolean;
  public readonly isFailure: boolean;

  private constructor(private readonly outcome: Outcome<T, E>) {
    this.isSuccess = outcome.ok;
    this.isFailure = !outcome.ok;
    Object.freeze(this);
  }

  public getValue(): T {
    if (!this.outcome.ok) {
      throw new Error("Can't get the value of an error result. Use getError instead.");
    }
    return this.outcome.value;
  }

  public getError(): E {
    if (this.outcome.ok) {
      throw new Error("Can't get the error of a success result. Use getValue instead.");
    }
    return this.outcome.error;
  }

  public map<U>(fn: (value: T) => U): Result<U, E> {
    return this.outcome.ok
      ? Result.ok(fn(this.outcome.value))
      : Result.fail(this.outcome.error);
  }

  public static ok<U, F = never>(value: U): Result<U, F> {
    return new Result<U, F>({ ok: true, value });
  }

  public static fail<U, F>(error: F): Result<U, F> {
    return new Result<U, F>({ ok: false, error });
  }

  /** Turns a rejected promise into a failed result carrying the error message. */
  public static async fromPromise<U>(
    promise: Promise<U>,
    fallbackMessage = 'Unknown error',
  ): Promise<Result<U, string>> {
    try {
      return Result.ok(await promise);
    } catch (error) {
      return Result.fail(errorMessage(error, fallbackMessage));
    }
  }
}

export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === 'string' && error) return error;
  return fallback;
}
