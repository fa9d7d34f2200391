/**
 * Unit tests for the Python front-end.
 */

import * as path from "path";
import { parsePython } from "../src/frontend/parser";
import { PythonSyntaxError, SourceNotFoundError, UsageError } from "../src/errors";

const FIXTURES_DIR = path.join(__dirname, "fixtures");

describe("parsePython", () => {
  it("should parse source text", () => {
    const parsed = parsePython({ source: "x = 1\ny = 2\n" });

    expect(parsed.root.type).toBe("module");
    expect(parsed.lines).toEqual(["x = 1", "y = 2", ""]);
    expect(parsed.filePath).toBeUndefined();
  });

  it("should default the module name to __main__ for raw source", () => {
    expect(parsePython({ source: "pass\n" }).moduleName).toBe("__main__");
  });

  it("should use the file stem as module name for files", () => {
    const parsed = parsePython({ filePath: path.join(FIXTURES_DIR, "project/orders.py") });

    expect(parsed.moduleName).toBe("orders");
    expect(parsed.source).toContain("def load_orders(customers):");
  });

  it("should keep an explicit module name", () => {
    const parsed = parsePython({ source: "pass\n", moduleName: "shop.views" });

    expect(parsed.moduleName).toBe("shop.views");
  });

  it("should strip a byte order mark", () => {
    const parsed = parsePython({ source: "\uFEFFx = 1\n" });

    expect(parsed.lines[0]).toBe("x = 1");
  });

  it("should reject both source and filePath", () => {
    expect(() => parsePython({ source: "x = 1", filePath: "a.py" })).toThrow(UsageError);
    expect(() => parsePython({ source: "x = 1", filePath: "a.py" })).toThrow(
      "Provide either source or filePath, not both"
    );
  });

  it("should reject neither source nor filePath", () => {
    expect(() => parsePython({})).toThrow("Either source or filePath must be provided");
  });

  it("should treat an empty string as source", () => {
    const parsed = parsePython({ source: "" });

    expect(parsed.root.type).toBe("module");
  });

  it("should report missing files as not found", () => {
    const missing = path.join(FIXTURES_DIR, "does-not-exist.py");

    expect(() => parsePython({ filePath: missing })).toThrow(SourceNotFoundError);
    expect(() => parsePython({ filePath: missing })).toThrow("Source file not found or not readable");
  });

  it("should report directories as not found", () => {
    expect(() => parsePython({ filePath: FIXTURES_DIR })).toThrow(SourceNotFoundError);
  });

  it("should report the line of a syntax error without echoing the source", () => {
    const source = "x = 1\ny = (2";

    let caught: unknown;
    try {
      parsePython({ source });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(PythonSyntaxError);
    if (caught instanceof PythonSyntaxError) {
      expect(caught.line).toBe(2);
      expect(caught.code).toBe("SYNTAX_ERROR");
      expect(caught.message).toBe("Invalid Python syntax at line 2");
    }
  });

  it("should reject a file with invalid syntax", () => {
    const broken = path.join(FIXTURES_DIR, "broken/bad_syntax.py");

    expect(() => parsePython({ filePath: broken })).toThrow(PythonSyntaxError);
  });

  it("should parse sources larger than the default input buffer", () => {
    const source = "x = 1\n".repeat(6000) + "async def f(p):\n    return open(p)\n";

    const parsed = parsePython({ source });

    expect(source.length).toBeGreaterThan(32 * 1024);
    expect(parsed.lines).toHaveLength(6003);
    expect(parsed.root.lastChild?.type).toBe("function_definition");
  });

  describe("Python 2 syntax", () => {
    function syntaxErrorLine(source: string): number | undefined {
      try {
        parsePython({ source });
      } catch (err) {
        if (err instanceof PythonSyntaxError) return err.line;
        throw err;
      }
      return undefined;
    }

    it("should reject print and exec statements", () => {
      expect(syntaxErrorLine('x = 1\nprint "hi"\n')).toBe(2);
      expect(syntaxErrorLine('exec "x = 1"\n')).toBe(1);
    });

    it("should accept print calls", () => {
      expect(syntaxErrorLine('print("hi")\nprint("a", "b")\n')).toBeUndefined();
    });

    it("should reject legacy octal and long literals", () => {
      expect(syntaxErrorLine("x = 0777\n")).toBe(1);
      expect(syntaxErrorLine("x = 10L\n")).toBe(1);
    });

    it("should accept zero, padded zero and prefixed literals", () => {
      expect(syntaxErrorLine("a = 0\nb = 00\nc = 0o777\nd = 0x1F\ne = 0_0\n")).toBeUndefined();
    });

    it("should reject the comma form of except", () => {
      const source = "try:\n    pass\nexcept ValueError, e:\n    pass\n";

      expect(syntaxErrorLine(source)).toBe(3);
    });

    it("should accept a tuple of exception types", () => {
      const source = "try:\n    pass\nexcept (ValueError, KeyError) as e:\n    pass\n";

      expect(syntaxErrorLine(source)).toBeUndefined();
    });

    it("should reject the <> operator", () => {
      expect(syntaxErrorLine("if a <> b:\n    pass\n")).toBe(1);
    });

    it("should reject backtick repr", () => {
      expect(syntaxErrorLine("x = 1\ny = 2\ns = `x`\n")).toBe(3);
    });

    it("should allow backticks inside strings and comments", () => {
      expect(syntaxErrorLine('s = "`x`"  # see `x`\n')).toBeUndefined();
    });
  });
});
