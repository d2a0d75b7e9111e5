import { FailureKind } from "../domain/models.js";

export interface ProducerFailure {
  kind: FailureKind;
  message: string;
}

export interface Succeeded<T> {
  ok: true;
  value: T;
}

export interface Failed {
  ok: false;
  failure: ProducerFailure;
}

/** Tagged result every producer and provider returns instead of throwing. */
export type Outcome<T> = Succeeded<T> | Failed;

export function succeeded<T>(value: T): Succeeded<T> {
  return { ok: true, value };
}

export function failed(kind: FailureKind, message: string): Failed {
  return { ok: false, failure: { kind, message } };
}

export function isRetryableKind(kind: FailureKind): boolean {
  return kind === "provider" || kind === "timeout";
}
