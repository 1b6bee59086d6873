import { describe, it, expect } from "vitest";
import { checkPythonSyntax, normalizeSource } from "../../../../src/core/validation/python-syntax.js";

function lines(...parts: string[]): string {
  return parts.join("\n") + "\n";
}

describe("checkPythonSyntax", () => {
  describe("accepts valid source", () => {
    it.each([
      ["empty file", ""],
      ["simple statements", lines("import numpy as np", "x = np.zeros((3, 3))", "print(x.sum())")],
      [
        "nested blocks",
        lines("class Model:", "    def forward(self, x):", "        if x:", "            return x", "        return None"),
      ],
      ["multi-line brackets", lines("config = {", "    'lr': 0.1,", "    'layers': [", "        64,", "    ],", "}")],
      ["comments with quotes and brackets", lines("# don't (", "x = 1  # ) ]")],
      ["hash inside strings", lines("s = '#not a comment'", 't = "(("')],
      ["escaped quotes", lines("s = 'it\\'s'", 't = "say \\"hi\\""')],
      ["triple-quoted strings", lines('"""Module docstring', "spanning (lines", '"""', "x = 1")],
      ["string prefixes", lines("a = f'{x}'", "b = rb'\\d'", "c = u'text'")],
      ["line continuation", lines("total = 1 + \\", "    2")],
      ["blank and comment lines inside a block", lines("if True:", "", "    # note", "    x = 1", "", "y = 2")],
      ["dedent to an outer level", lines("for i in range(3):", "    if i:", "        pass", "x = i")],
      ["tabs", lines("if True:", "\tx = 1")],
      ["no trailing newline", "x = 1"],
    ])("%s", (_name, source) => {
      expect(checkPythonSyntax(source)).toBeNull();
    });
  });

  it("reports a Python 2 print statement", () => {
    expect(checkPythonSyntax(lines("import os", 'print "x"'))).toEqual({
      message: "Missing parentheses in call to 'print'. Did you mean print(...)?",
      line: 2,
      column: 1,
    });
  });

  it.each([
    ["print to a stream", lines("if True:", "    print >>f, x")],
    ["exec of a name", lines("exec code")],
    ["print of a number", lines("print 1")],
  ])("reports a statement-style call: %s", (_name, source) => {
    expect(checkPythonSyntax(source)?.message).toMatch(/^Missing parentheses in call to '(print|exec)'/);
  });

  it.each([
    ["assignment to print", lines("print = logger.info")],
    ["attribute access", lines("print.__doc__")],
    ["call with a space", lines("print (x)")],
    ["membership test", lines("print in handlers")],
    ["print inside a call", lines("run(print, 'x')")],
  ])("accepts print used as a name: %s", (_name, source) => {
    expect(checkPythonSyntax(source)).toBeNull();
  });

  it("reports an unmatched closing parenthesis", () => {
    expect(checkPythonSyntax(lines("x = foo(1))"))).toEqual({ message: "unmatched ')'", line: 1, column: 11 });
  });

  it("reports a parenthesis that is never closed at its opening position", () => {
    expect(checkPythonSyntax(lines("print((1, 2)", "y = 3"))).toEqual({
      message: "'(' was never closed",
      line: 1,
      column: 6,
    });
  });

  it("reports mismatched brackets on the same line", () => {
    expect(checkPythonSyntax(lines("x = [1, 2)"))).toEqual({
      message: "closing parenthesis ')' does not match opening parenthesis '['",
      line: 1,
      column: 10,
    });
  });

  it("names the opening line of a mismatched bracket on another line", () => {
    expect(checkPythonSyntax(lines("x = (", "  1,", "]"))).toEqual({
      message: "closing parenthesis ']' does not match opening parenthesis '(' on line 1",
      line: 3,
      column: 1,
    });
  });

  it("reports an unterminated string", () => {
    expect(checkPythonSyntax(lines("s = 'abc", "x = 1"))).toEqual({
      message: "unterminated string literal (detected at line 1)",
      line: 1,
      column: 5,
    });
  });

  it("reports an unterminated triple-quoted string", () => {
    expect(checkPythonSyntax(lines('s = """abc', "more"))).toEqual({
      message: "unterminated triple-quoted string literal (detected at line 2)",
      line: 1,
      column: 5,
    });
  });

  it("reports an unexpected indent", () => {
    expect(checkPythonSyntax(lines("x = 1", "    y = 2"))).toEqual({
      message: "unexpected indent",
      line: 2,
      column: 5,
    });
  });

  it("reports an inconsistent dedent", () => {
    expect(checkPythonSyntax(lines("if x:", "    a = 1", "  b = 2"))).toEqual({
      message: "unindent does not match any outer indentation level",
      line: 3,
      column: 3,
    });
  });

  it("reports a block header without a body", () => {
    expect(checkPythonSyntax(lines("if x:", "pass"))).toEqual({
      message: "expected an indented block after line 1",
      line: 2,
      column: 1,
    });
  });

  it("reports a block header at the end of the file", () => {
    expect(checkPythonSyntax(lines("def f():"))?.message).toBe("expected an indented block after line 1");
    expect(checkPythonSyntax("def f():")?.message).toBe("expected an indented block after line 1");
  });

  it("reports a stray character after a line continuation", () => {
    expect(checkPythonSyntax(lines("x = 1 \\ 2"))).toEqual({
      message: "unexpected character after line continuation character",
      line: 1,
      column: 8,
    });
  });

  it("handles a BOM and CRLF line endings", () => {
    expect(checkPythonSyntax("\uFEFFif x:\r\n    pass\r\n")).toBeNull();
    expect(checkPythonSyntax("x = 1\r\n    y = 2\r\n")?.line).toBe(2);
  });
});

describe("normalizeSource", () => {
  it("strips a BOM and normalizes line endings", () => {
    expect(normalizeSource("\uFEFFa\r\nb\rc\n")).toBe("a\nb\nc\n");
  });
});
