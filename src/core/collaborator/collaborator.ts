import type { DiagnosticEntry } from "../types.js";

export interface ProposalRequest {
  /** POSIX path relative to the repository root */
  filePath: string;
  /** Current content: the original on the first attempt, the last failing candidate after */
  content: string;
  /** Every failed attempt so far, oldest first; empty on the first attempt */
  history: readonly DiagnosticEntry[];
  /** 1-based number of the attempt this proposal is for */
  attempt: number;
}

/**
 * Produces a full replacement for one file.
 * Failures surface as CollaboratorError.
 */
export interface Collaborator {
  propose(request: ProposalRequest, signal?: AbortSignal): Promise<string>;
}
