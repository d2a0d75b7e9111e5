import { formatError } from "../domain/errors.js";
import { LessonNumber, StageArtifact, StageName, TierFailure } from "../domain/models.js";
import { delay } from "../utils/delay.js";
import { Outcome, failed, isRetryableKind } from "./outcome.js";

export interface ProducerContext {
  signal: AbortSignal;
  attempt: number;
}

/** One candidate tier of a fallback chain. */
export interface Producer<I, O> {
  readonly name: string;
  readonly timeoutMs: number;
  /** Whether provider and timeout failures may be retried on this tier. */
  readonly retryable: boolean;
  /** Whether a success means an outside provider was called (drives rate-limit pacing). */
  readonly external: boolean;
  produce(input: I, context: ProducerContext): Promise<Outcome<O>>;
}

/**
 * The last tier of every chain. It is synchronous and does local synthesis only,
 * which is what allows every stage to assume an artifact exists.
 */
export interface TerminalProducer<I, O> {
  readonly name: string;
  produce(input: I): O;
}

export interface FallbackPolicy<I, O> {
  stage: StageName;
  producers: ReadonlyArray<Producer<I, O>>;
  terminal: TerminalProducer<I, O>;
}

export interface FallbackChainOptions {
  retryCount: number;
  retryBackoffMs?: number;
  verbose?: boolean;
}

export interface ChainResult<O> {
  value: O;
  tier: number;
  providerUsed: string;
  attemptCount: number;
  degraded: boolean;
  external: boolean;
  failures: TierFailure[];
}

interface TierRun<O> {
  outcome: Outcome<O>;
  attempts: number;
}

const DEFAULT_BACKOFF_MS = 300;

export class FallbackChain<I, O> {
  constructor(
    private readonly policy: FallbackPolicy<I, O>,
    private readonly options: FallbackChainOptions
  ) {}

  get tierCount(): number {
    return this.policy.producers.length + 1;
  }

  async execute(input: I, signal?: AbortSignal, label: string = this.policy.stage): Promise<ChainResult<O>> {
    const failures: TierFailure[] = [];
    let attemptCount = 0;

    for (const [index, producer] of this.policy.producers.entries()) {
      if (signal?.aborted) {
        break;
      }

      const tier = index + 1;
      const run = await this.runTier(producer, tier, input, failures, label, signal);
      attemptCount += run.attempts;

      if (run.outcome.ok) {
        if (tier > 1) {
          this.warnDegraded(label, producer.name, tier);
        }

        return {
          value: run.outcome.value,
          tier,
          providerUsed: producer.name,
          attemptCount,
          degraded: tier > 1,
          external: producer.external,
          failures
        };
      }
    }

    const tier = this.tierCount;
    const value = this.policy.terminal.produce(input);
    if (tier > 1) {
      this.warnDegraded(label, this.policy.terminal.name, tier);
    }

    return {
      value,
      tier,
      providerUsed: this.policy.terminal.name,
      attemptCount: attemptCount + 1,
      degraded: tier > 1,
      external: false,
      failures
    };
  }

  private async runTier(
    producer: Producer<I, O>,
    tier: number,
    input: I,
    failures: TierFailure[],
    label: string,
    signal?: AbortSignal
  ): Promise<TierRun<O>> {
    const maxAttempts = producer.retryable ? this.options.retryCount + 1 : 1;
    let outcome: Outcome<O> = failed("cancelled", `${producer.name} was not attempted`);
    let attempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (signal?.aborted) {
        break;
      }

      attempts = attempt;
      outcome = await this.attempt(producer, input, attempt, signal);
      if (outcome.ok) {
        return { outcome, attempts };
      }

      failures.push({ tier, producer: producer.name, attempt, ...outcome.failure });
      this.logFailure(label, producer.name, tier, attempt, outcome.failure.kind, outcome.failure.message);

      if (!isRetryableKind(outcome.failure.kind) || attempt === maxAttempts) {
        break;
      }

      await delay((this.options.retryBackoffMs ?? DEFAULT_BACKOFF_MS) * attempt, signal);
    }

    return { outcome, attempts };
  }

  private async attempt(
    producer: Producer<I, O>,
    input: I,
    attempt: number,
    parentSignal?: AbortSignal
  ): Promise<Outcome<O>> {
    const controller = new AbortController();
    const relay = (): void => controller.abort();
    parentSignal?.addEventListener("abort", relay, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const guard = new Promise<Outcome<O>>((resolve) => {
      timer = setTimeout(() => {
        resolve(failed("timeout", `${producer.name} did not finish within ${producer.timeoutMs}ms`));
        controller.abort();
      }, producer.timeoutMs);
      controller.signal.addEventListener(
        "abort",
        () => resolve(failed("cancelled", `${producer.name} was cancelled`)),
        { once: true }
      );
    });

    try {
      return await Promise.race([this.invoke(producer, input, { signal: controller.signal, attempt }), guard]);
    } finally {
      clearTimeout(timer);
      parentSignal?.removeEventListener("abort", relay);
    }
  }

  private async invoke(producer: Producer<I, O>, input: I, context: ProducerContext): Promise<Outcome<O>> {
    try {
      return await producer.produce(input, context);
    } catch (error) {
      return failed("provider", formatError(error));
    }
  }

  private logFailure(
    label: string,
    producerName: string,
    tier: number,
    attempt: number,
    kind: string,
    message: string
  ): void {
    if (!this.options.verbose) {
      return;
    }
    console.log(`[fallback:${this.policy.stage}] ${label} tier ${tier} ${producerName} attempt ${attempt} ${kind}: ${message}`);
  }

  private warnDegraded(label: string, producerName: string, tier: number): void {
    console.warn(`[fallback:${this.policy.stage}] ${label} degraded to tier ${tier} (${producerName})`);
  }
}

export function toStageArtifact<T>(
  stage: StageName,
  lessonNumber: LessonNumber | null,
  result: ChainResult<T>
): StageArtifact<T> {
  return {
    stage,
    lessonNumber,
    value: result.value,
    providerUsed: result.providerUsed,
    tier: result.tier,
    attemptCount: result.attemptCount,
    degraded: result.degraded,
    external: result.external,
    failures: result.failures,
    producedAt: new Date().toISOString()
  };
}

/** Replaces the artifact value, e.g. an in-memory asset with the file it was written to. */
export function withArtifactValue<T, U>(artifact: StageArtifact<T>, value: U): StageArtifact<U> {
  return { ...artifact, value };
}
