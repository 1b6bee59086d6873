/**
 * Wraps a collaborator with a per-call timeout, error classification,
 * retry with backoff for transient failures, and a circuit breaker.
 */
import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "../../utils/logger.js";
import { CollaboratorError, RunAbortedError, classifyCollaboratorError } from "../errors.js";
import type { CircuitBreaker } from "../llm/circuit-breaker.js";
import type { Collaborator, ProposalRequest } from "./collaborator.js";

export const DEFAULT_RETRY_DELAYS_MS = [1000, 2000, 4000];

export interface ResilientCollaboratorOptions {
  timeoutMs: number;
  retryDelaysMs?: readonly number[];
  /** Replaceable in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class ResilientCollaborator implements Collaborator {
  private readonly retryDelaysMs: readonly number[];
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly inner: Collaborator,
    private readonly circuitBreaker: CircuitBreaker,
    private readonly logger: Logger,
    private readonly options: ResilientCollaboratorOptions
  ) {
    this.retryDelaysMs = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
    this.sleep = options.sleep ?? abortableSleep;
  }

  async propose(request: ProposalRequest, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new RunAbortedError("Run aborted before contacting the collaborator");
    }
    if (!this.circuitBreaker.canExecute()) {
      throw new CollaboratorError(
        "unreachable",
        "Collaborator circuit breaker is open after repeated failures; collaborator temporarily unavailable"
      );
    }

    let lastError: CollaboratorError | undefined;

    for (let attempt = 0; attempt <= this.retryDelaysMs.length; attempt++) {
      try {
        const candidate = await this.callWithTimeout(request, signal);
        this.circuitBreaker.recordSuccess();
        return candidate;
      } catch (err) {
        if (err instanceof RunAbortedError) throw err;
        lastError = classifyCollaboratorError(err);

        const wait = this.retryDelaysMs[attempt];
        if (wait !== undefined && lastError.retryable) {
          this.logger.debug(
            { attempt: attempt + 1, delay: wait, kind: lastError.kind, error: lastError.message },
            "Retrying collaborator request"
          );
          await this.sleep(wait, signal);
          continue;
        }

        break;
      }
    }

    // All retries exhausted
    this.circuitBreaker.recordFailure();
    if (this.circuitBreaker.getState() === "open") {
      this.logger.error(
        { failures: this.circuitBreaker.getFailureCount(), error: lastError?.message },
        "Collaborator circuit breaker opened"
      );
    }

    throw lastError ?? new CollaboratorError("provider", "Collaborator request failed");
  }

  private callWithTimeout(request: ProposalRequest, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const timeoutMs = this.options.timeoutMs;

    return new Promise<string>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      const timer = setTimeout(() => {
        cleanup();
        controller.abort();
        reject(new CollaboratorError("timeout", `Collaborator did not respond within ${timeoutMs} ms`));
      }, timeoutMs);

      const onAbort = (): void => {
        cleanup();
        controller.abort();
        reject(new RunAbortedError("Run aborted while waiting for the collaborator"));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      void this.inner.propose(request, controller.signal).then(
        (candidate) => {
          cleanup();
          resolve(candidate);
        },
        (err: unknown) => {
          cleanup();
          reject(err);
        }
      );
    });
  }
}

async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    throw new RunAbortedError("Run aborted during collaborator backoff", { cause: err });
  }
}
