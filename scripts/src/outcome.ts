import { ClientError } from "./errors";

export type CancelReason = "interrupt" | "end_of_input";

export type Success<T> = { kind: "success"; value: T };
export type Failure = { kind: "failure"; error: ClientError };
export type Cancelled = { kind: "cancelled"; reason: CancelReason };

/**
 * Result of every blocking step of the client (connect, read a line, send).
 * Expected failures and cancellations are values, not exceptions.
 */
export type Outcome<T> = Success<T> | Failure | Cancelled;

export function success<T>(value: T): Success<T> {
	return { kind: "success", value };
}

export function failure(error: ClientError): Failure {
	return { kind: "failure", error };
}

export function cancelled(reason: CancelReason): Cancelled {
	return { kind: "cancelled", reason };
}

/**
 * Waits for the step or for the interrupt signal, whichever comes first.
 * The step keeps running when the signal wins; the caller owns cleaning it up.
 */
export function raceInterrupt<T>(step: Promise<Outcome<T>>, signal?: AbortSignal): Promise<Outcome<T>> {
	if (!signal) {
		return step;
	}
	if (signal.aborted) {
		return Promise.resolve(cancelled("interrupt"));
	}

	return new Promise<Outcome<T>>((resolve, reject) => {
		const onAbort = () => resolve(cancelled("interrupt"));
		signal.addEventListener("abort", onAbort, { once: true });
		step.then(
			outcome => {
				signal.removeEventListener("abort", onAbort);
				resolve(outcome);
			},
			error => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			});
	});
}
