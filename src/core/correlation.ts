/**
 * Run context using AsyncLocalStorage.
 * Propagates the run id and the file being upgraded through the async call
 * stack so every log line can be attributed.
 */
import { AsyncLocalStorage } from "node:async_hooks";

export interface RunContext {
  runId: string;
  file?: string;
}

export const runContext = new AsyncLocalStorage<RunContext>();

export function withContext<T>(ctx: RunContext, fn: () => Promise<T>): Promise<T> {
  return runContext.run(ctx, fn);
}

/** Run `fn` with the current run context extended by the given file. */
export function withFileContext<T>(file: string, fn: () => Promise<T>): Promise<T> {
  const parent = runContext.getStore();
  return runContext.run({ runId: parent?.runId ?? "detached", file }, fn);
}

export function getCurrentContext(): RunContext | undefined {
  return runContext.getStore();
}
