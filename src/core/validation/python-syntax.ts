/**
 * Structural syntax check for Python source without a Python interpreter.
 *
 * Tokenises just enough of the language (comments, string literals with
 * prefixes, bracket nesting, line continuations, indentation) to catch the
 * errors an LLM rewrite most often introduces. Messages follow CPython's
 * wording so they read naturally in feedback to the collaborator.
 */

export interface PythonSyntaxIssue {
  message: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const CLOSERS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };
const STRING_PREFIXES = new Set(["r", "u", "b", "f", "br", "rb", "fr", "rf"]);
const TAB_SIZE = 8;
const STATEMENT_CALLS = new Set(["print", "exec"]);
/** Words that may follow a bare `print` name in a valid expression */
const OPERATOR_KEYWORDS = new Set(["and", "or", "in", "is", "not", "if", "else", "for"]);

interface OpenBracket {
  char: string;
  line: number;
  column: number;
}

class SyntaxIssueFound extends Error {
  constructor(readonly issue: PythonSyntaxIssue) {
    super(issue.message);
  }
}

/** Returns the first issue found, or null when the source is structurally sound. */
export function checkPythonSyntax(source: string): PythonSyntaxIssue | null {
  const scanner = new Scanner(normalizeSource(source));
  try {
    scanner.scan();
    return null;
  } catch (err) {
    if (err instanceof SyntaxIssueFound) return err.issue;
    throw err;
  }
}

export function normalizeSource(source: string): string {
  const text = source.startsWith("\uFEFF") ? source.slice(1) : source;
  return text.replace(/\r\n?/g, "\n");
}

class Scanner {
  private pos = 0;
  private line = 1;
  private lineStart = 0;
  private readonly brackets: OpenBracket[] = [];
  private readonly indents: number[] = [0];
  /** Line of a block header (`...:`) still waiting for its indented body */
  private pendingBlock: number | null = null;
  /** Last significant token on the current logical line */
  private lastToken = "";

  constructor(private readonly src: string) {}

  scan(): void {
    let atLineStart = true;

    while (this.pos < this.src.length) {
      if (atLineStart && this.brackets.length === 0) {
        if (this.handleIndentation()) continue;
        atLineStart = false;
      }

      const c = this.src.charAt(this.pos);

      if (c === "\n") {
        this.endPhysicalLine();
        if (this.brackets.length === 0) {
          if (this.lastToken === ":") this.pendingBlock = this.line - 1;
          this.lastToken = "";
          atLineStart = true;
        }
        continue;
      }

      if (c === " " || c === "\t" || c === "\f") {
        this.pos++;
        continue;
      }

      if (c === "#") {
        this.skipComment();
        continue;
      }

      if (c === "\\") {
        this.lineContinuation();
        continue;
      }

      if (c === "'" || c === '"') {
        this.scanString("");
        continue;
      }

      if (isIdentifierChar(c)) {
        const word = this.readWord();
        const next = this.src.charAt(this.pos);
        if ((next === "'" || next === '"') && STRING_PREFIXES.has(word.toLowerCase())) {
          this.scanString(word.toLowerCase());
        } else {
          if (this.lastToken === "" && this.brackets.length === 0 && STATEMENT_CALLS.has(word)) {
            this.checkStatementCall(word, this.column() - word.length);
          }
          this.lastToken = word;
        }
        continue;
      }

      if (c in OPENERS) {
        this.brackets.push({ char: c, line: this.line, column: this.column() });
        this.lastToken = c;
        this.pos++;
        continue;
      }

      if (c in CLOSERS) {
        this.closeBracket(c);
        this.lastToken = c;
        this.pos++;
        continue;
      }

      this.lastToken = c;
      this.pos++;
    }

    this.finish();
  }

  /**
   * Measure and check the indentation of a new logical line.
   * Returns true when the line is blank or comment-only and was consumed.
   */
  private handleIndentation(): boolean {
    let width = 0;
    while (this.pos < this.src.length) {
      const c = this.src.charAt(this.pos);
      if (c === " ") width++;
      else if (c === "\t") width = (Math.floor(width / TAB_SIZE) + 1) * TAB_SIZE;
      else if (c === "\f") width = 0;
      else break;
      this.pos++;
    }

    const next = this.src.charAt(this.pos);
    if (next === "" || next === "\n" || next === "#") {
      if (next === "#") this.skipComment();
      if (next === "\n") this.endPhysicalLine();
      return true;
    }

    const current = this.indents[this.indents.length - 1] ?? 0;
    if (width > current) {
      if (this.pendingBlock === null) {
        this.fail("unexpected indent", this.line, width + 1);
      }
      this.indents.push(width);
      this.pendingBlock = null;
      return false;
    }

    if (this.pendingBlock !== null) {
      this.fail(`expected an indented block after line ${this.pendingBlock}`, this.line, width + 1);
    }

    while (width < (this.indents[this.indents.length - 1] ?? 0)) {
      this.indents.pop();
    }
    if (width !== (this.indents[this.indents.length - 1] ?? 0)) {
      this.fail("unindent does not match any outer indentation level", this.line, width + 1);
    }
    return false;
  }

  private scanString(prefix: string): void {
    const quote = this.src.charAt(this.pos);
    const startLine = this.line;
    const startColumn = this.column() - prefix.length;
    const triple = this.src.startsWith(quote.repeat(3), this.pos);

    this.pos += triple ? 3 : 1;

    while (this.pos < this.src.length) {
      const c = this.src.charAt(this.pos);

      if (c === "\\") {
        // Even in raw strings a backslash keeps the next quote from closing.
        if (this.src.charAt(this.pos + 1) === "\n") {
          this.pos++;
          this.endPhysicalLine();
        } else {
          this.pos += 2;
        }
        continue;
      }

      if (c === "\n") {
        if (!triple) {
          this.fail(`unterminated string literal (detected at line ${startLine})`, startLine, startColumn);
        }
        this.endPhysicalLine();
        continue;
      }

      if (c === quote) {
        if (!triple) {
          this.pos++;
          this.lastToken = "string";
          return;
        }
        if (this.src.startsWith(quote.repeat(3), this.pos)) {
          this.pos += 3;
          this.lastToken = "string";
          return;
        }
      }

      this.pos++;
    }

    if (triple) {
      const lastLine = this.src.endsWith("\n") ? this.line - 1 : this.line;
      this.fail(`unterminated triple-quoted string literal (detected at line ${lastLine})`, startLine, startColumn);
    }
    this.fail(`unterminated string literal (detected at line ${startLine})`, startLine, startColumn);
  }

  private closeBracket(closer: string): void {
    const open = this.brackets.pop();
    if (!open) {
      this.fail(`unmatched '${closer}'`, this.line, this.column());
    }
    if (OPENERS[open.char] !== closer) {
      const where = open.line === this.line ? "" : ` on line ${open.line}`;
      this.fail(
        `closing parenthesis '${closer}' does not match opening parenthesis '${open.char}'${where}`,
        this.line,
        this.column()
      );
    }
  }

  private lineContinuation(): void {
    if (this.src.charAt(this.pos + 1) === "\n") {
      this.pos++;
      this.endPhysicalLine();
      return;
    }
    if (this.pos + 1 >= this.src.length) {
      this.fail("unexpected EOF while parsing", this.line, this.column());
    }
    this.fail("unexpected character after line continuation character", this.line, this.column() + 1);
  }

  private finish(): void {
    const unclosed = this.brackets[this.brackets.length - 1];
    if (unclosed) {
      this.fail(`'${unclosed.char}' was never closed`, unclosed.line, unclosed.column);
    }
    if (this.lastToken === ":") {
      this.pendingBlock = this.line;
    }
    if (this.pendingBlock !== null) {
      this.fail(`expected an indented block after line ${this.pendingBlock}`, this.line, 1);
    }
  }

  /** `print "x"` and `exec code` are statements only in Python 2. */
  private checkStatementCall(word: string, column: number): void {
    let p = this.pos;
    while (this.src.charAt(p) === " " || this.src.charAt(p) === "\t") p++;
    if (p === this.pos) return;

    const next = this.src.charAt(p);
    if (next === "'" || next === '"' || this.src.startsWith(">>", p)) {
      this.fail(`Missing parentheses in call to '${word}'. Did you mean ${word}(...)?`, this.line, column);
    }
    if (!isIdentifierChar(next)) return;

    let end = p;
    while (end < this.src.length && isIdentifierChar(this.src.charAt(end))) end++;
    if (!OPERATOR_KEYWORDS.has(this.src.slice(p, end))) {
      this.fail(`Missing parentheses in call to '${word}'. Did you mean ${word}(...)?`, this.line, column);
    }
  }

  private readWord(): string {
    const start = this.pos;
    while (this.pos < this.src.length && isIdentifierChar(this.src.charAt(this.pos))) {
      this.pos++;
    }
    return this.src.slice(start, this.pos);
  }

  private skipComment(): void {
    const end = this.src.indexOf("\n", this.pos);
    this.pos = end === -1 ? this.src.length : end;
  }

  /** Consume the newline at `pos` and move to the next physical line. */
  private endPhysicalLine(): void {
    this.pos++;
    this.line++;
    this.lineStart = this.pos;
  }

  private column(): number {
    return this.pos - this.lineStart + 1;
  }

  private fail(message: string, line: number, column: number): never {
    throw new SyntaxIssueFound({ message, line, column });
  }
}

function isIdentifierChar(c: string): boolean {
  return /[A-Za-z0-9_]/.test(c) || c.charCodeAt(0) > 0x7f;
}
