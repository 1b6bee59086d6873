import { describe, it, expect, vi } from "vitest";
import { passedResult, type CandidateFile } from "../../../../src/core/types.js";
import { ValidationPipeline, type RuntimeValidator } from "../../../../src/core/validation/pipeline.js";
import { PythonSyntaxChecker, Validator } from "../../../../src/core/validation/validator.js";
import { failedResult } from "../../../helpers/fixtures.js";
import { createMockLogger } from "../../../helpers/mocks.js";

function candidate(content: string): CandidateFile {
  return { relativePath: "train.py", absolutePath: "/repo/train.py", content };
}

function createPipeline(runtime: RuntimeValidator | null): ValidationPipeline {
  const logger = createMockLogger();
  return new ValidationPipeline(new Validator([new PythonSyntaxChecker()], logger, 6000), runtime, logger);
}

describe("ValidationPipeline", () => {
  it("never reaches the runtime stage when syntax fails", async () => {
    const runtime = { validate: vi.fn(async () => passedResult({ stage: "runtime" })) };
    const pipeline = createPipeline(runtime);

    const result = await pipeline.run([candidate("model = build(\n    layers=[1, 2]\n")]);

    expect(result.passed).toBe(false);
    expect(result.stage).toBe("syntax");
    expect(result.reason).toBe("SyntaxError: '(' was never closed (train.py, line 1)");
    expect(runtime.validate).not.toHaveBeenCalled();
  });

  it("runs the runtime stage after syntax passes", async () => {
    const runtimeFailure = failedResult();
    const runtime = { validate: vi.fn(async () => runtimeFailure) };
    const pipeline = createPipeline(runtime);

    const result = await pipeline.run([candidate("x = 1\n")]);

    expect(result).toBe(runtimeFailure);
    expect(runtime.validate).toHaveBeenCalledTimes(1);
  });

  it("passes the abort signal to the runtime stage", async () => {
    const runtime = { validate: vi.fn(async (_signal?: AbortSignal) => passedResult({ stage: "runtime" })) };
    const controller = new AbortController();

    await createPipeline(runtime).run([candidate("x = 1\n")], controller.signal);

    expect(runtime.validate).toHaveBeenCalledWith(controller.signal);
  });

  it("is syntax-only without a runtime stage", async () => {
    const result = await createPipeline(null).run([candidate("x = 1\n")]);

    expect(result).toMatchObject({ passed: true, stage: "syntax" });
  });
});
