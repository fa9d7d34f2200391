import * as path from "path";
import { createDefaultConfig, loadConfigFromString } from "../src/config/loader";
import { handlePerformanceCheck } from "../src/handler";

const FIXTURES_DIR = path.join(__dirname, "fixtures");

const N_PLUS_ONE = `
def load(ids):
    for i in ids:
        Item.objects.get(pk=i)
`;

describe("handlePerformanceCheck", () => {
  it("should return issue records for source text", () => {
    const response = handlePerformanceCheck({ source: N_PLUS_ONE });

    expect(response).toEqual({
      success: true,
      issues: [
        {
          category: "repeated-query-in-loop",
          severity: "high",
          line_number: 4,
          end_line_number: 4,
          description: "Potential N+1 query: Item.objects.get called inside a loop",
          suggestion:
            "Use select_related() for foreign keys or prefetch_related() for many-to-many relationships " +
            "to fetch related objects in a single query",
          code_snippet: "        Item.objects.get(pk=i)",
          function_name: "load",
        },
      ],
      summary: {
        total_issues: 1,
        by_severity: { critical: 0, high: 1, medium: 0, low: 0 },
        by_category: {
          "repeated-query-in-loop": 1,
          "blocking-io-in-async": 0,
          "inefficient-loop": 0,
          "memory-load": 0,
          "exception-in-loop": 0,
          "type-conversion-in-loop": 0,
          "global-mutation": 0,
        },
      },
    });
  });

  it("should use null for absent function names", () => {
    const response = handlePerformanceCheck({ source: "for i in ids:\n    Item.objects.get(pk=i)\n" });

    expect(response.success && response.issues[0].function_name).toBeNull();
  });

  it("should analyze a file path", () => {
    const response = handlePerformanceCheck({ file_path: path.join(FIXTURES_DIR, "sample_clean.py") });

    expect(response.success).toBe(true);
    expect(response.success && response.summary.total_issues).toBe(0);
  });

  it("should apply the given config", () => {
    const config = loadConfigFromString("rules:\n  repeated-query-in-loop:\n    severity: low\n");
    const response = handlePerformanceCheck({ source: N_PLUS_ONE, config });

    expect(response.success && response.issues.map((issue) => issue.severity)).toEqual(["low"]);
  });

  it("should resolve relative imports against module_name", () => {
    const source = `
from .net import urlopen_sync

async def refresh():
    urlopen_sync()
`;
    const config = loadConfigFromString(`
catalog:
  blocking_io:
    - on: resolved
      mode: exact
      value: shop.net.urlopen_sync
`);

    const anchored = handlePerformanceCheck({ source, module_name: "shop.views", config });
    const unanchored = handlePerformanceCheck({ source, config });

    expect(anchored.success && anchored.issues.map((issue) => issue.category)).toEqual([
      "blocking-io-in-async",
    ]);
    expect(unanchored.success && unanchored.issues).toEqual([]);
  });

  it("should report syntax errors without the source", () => {
    const response = handlePerformanceCheck({ source: "x = 1\ny = (2" });

    expect(response).toEqual({
      success: false,
      error: { code: "SYNTAX_ERROR", message: "Invalid Python syntax at line 2" },
    });
  });

  it("should report usage errors", () => {
    expect(handlePerformanceCheck({})).toEqual({
      success: false,
      error: { code: "USAGE_ERROR", message: "Either source or filePath must be provided" },
    });
  });

  it("should report missing files", () => {
    const response = handlePerformanceCheck({ file_path: path.join(FIXTURES_DIR, "nope.py") });

    expect(response).toEqual({
      success: false,
      error: { code: "NOT_FOUND", message: "Source file not found or not readable" },
    });
  });

  it("should hide unexpected failures behind an internal error", () => {
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const config = {
      ...createDefaultConfig(),
      getRuleConfig: () => {
        throw new Error("rule lookup failed");
      },
    };

    const response = handlePerformanceCheck({ source: "x = 1\n", config });

    expect(response).toEqual({
      success: false,
      error: { code: "INTERNAL_ERROR", message: "Internal error while analyzing source" },
    });
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("Performance check failed"));
    errorSpy.mockRestore();
  });
});
