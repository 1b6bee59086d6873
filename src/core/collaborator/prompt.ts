/**
 * Prompt construction and reply parsing for the LLM collaborator.
 */
import { CollaboratorError } from "../errors.js";
import { formatDiagnostic } from "../types.js";
import type { ProposalRequest } from "./collaborator.js";

export const SYSTEM_PROMPT = `You are an expert ML code migration assistant.
Rewrite Python code to work with the latest versions of TensorFlow, PyTorch, NumPy, and JAX.

IMPORTANT MIGRATION PATTERNS:
- TensorFlow 1.x → 2.x: remove tf.Session and tf.placeholder, use eager execution and tf.function; tf.compat.v1 only as a last resort
- tf.layers and tf.contrib move to tf.keras equivalents; tf.get_variable becomes tf.Variable
- PyTorch: drop torch.autograd.Variable, replace torch.cuda.FloatTensor and similar constructors with torch.tensor(..., device=...)
- NumPy: replace removed aliases (np.int, np.float, np.bool, np.object) with builtins; np.asscalar(x) becomes x.item()
- JAX: update to current APIs (jax.tree_util, jax.random key handling, jax.numpy)

Preserve ALL functionality and the public interface of the file.
Return ONLY the complete corrected file in a single \`\`\`python code block, with no explanations.`;

/** Build the user message for one attempt. */
export function buildUserPrompt(request: ProposalRequest): string {
  const parts = [`File: ${request.filePath}`];

  if (request.history.length === 0) {
    parts.push("", "Code to upgrade:", fence(request.content));
    return parts.join("\n");
  }

  parts.push("", "Previous attempts at upgrading this file failed validation:");
  for (const entry of request.history) {
    parts.push("", formatDiagnostic(entry));
  }
  parts.push(
    "",
    "Fix the issue and return the full corrected file.",
    "",
    "Code from the last attempt:",
    fence(request.content)
  );
  return parts.join("\n");
}

function fence(code: string): string {
  return "```python\n" + code.replace(/\n$/, "") + "\n```";
}

const PYTHON_BLOCK = /```(?:python|py|python3)[^\n]*\n([\s\S]*?)```/i;
const ANY_BLOCK = /```[^\n]*\n([\s\S]*?)```/;
/** A reply cut off before its closing fence */
const UNCLOSED_BLOCK = /^```[^\n]*\n([\s\S]*)$/;
const APOLOGY_PREFIXES = ["i'm sorry", "im sorry", "sorry", "i cannot", "i can't", "i can’t", "as an ai"];
const PLACEHOLDER_MARKERS = ["# upgraded code here", "# your code here", "# ... rest of the code"];

/**
 * Extract the candidate file from a reply: the first python block, else the
 * first fenced block, else the whole reply. Rejects empty and non-code replies.
 */
export function extractCandidate(reply: string | null): string {
  const text = (reply ?? "").trim();
  const match = PYTHON_BLOCK.exec(text) ?? ANY_BLOCK.exec(text) ?? UNCLOSED_BLOCK.exec(text);
  const code = (match?.[1] ?? text).trim();

  if (code.length === 0) {
    throw new CollaboratorError("malformed", "Collaborator returned an empty response");
  }

  const lower = code.toLowerCase();
  if (APOLOGY_PREFIXES.some((prefix) => lower.startsWith(prefix))) {
    throw new CollaboratorError("malformed", "Collaborator returned a refusal instead of upgraded code");
  }
  if (PLACEHOLDER_MARKERS.some((marker) => lower.startsWith(marker))) {
    throw new CollaboratorError("malformed", "Collaborator returned placeholder text instead of upgraded code");
  }

  return code + "\n";
}
