/**
 * Syntax first, then runtime. A candidate that fails syntax never reaches
 * the harness.
 */
import type { Logger } from "../../utils/logger.js";
import type { CandidateFile, ValidationResult } from "../types.js";
import type { Validator } from "./validator.js";

/** What the pipeline needs from the runtime harness. */
export interface RuntimeValidator {
  validate(signal?: AbortSignal): Promise<ValidationResult>;
}

export class ValidationPipeline {
  constructor(
    private readonly validator: Validator,
    /** Null runs syntax-only */
    private readonly runtime: RuntimeValidator | null,
    private readonly logger: Logger
  ) {}

  async run(files: CandidateFile[], signal?: AbortSignal): Promise<ValidationResult> {
    const syntax = await this.validator.validate(files, signal);
    if (!syntax.passed || !this.runtime) {
      return syntax;
    }

    this.logger.debug({ files: files.map((f) => f.relativePath) }, "Syntax passed; running runtime validation");
    return this.runtime.validate(signal);
  }
}
