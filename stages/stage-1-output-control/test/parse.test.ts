import { describe, expect, it } from "vitest";
import { extractJson } from "../src/index.js";

describe("extractJson", () => {
  it("returns a bare object unchanged", () => {
    expect(extractJson('{"a":1}')).toEqual({ found: true, json: '{"a":1}' });
  });

  it("strips a markdown code fence", () => {
    expect(extractJson('```json\n{"a":1}\n```')).toEqual({
      found: true,
      json: '{"a":1}',
    });
  });

  it("finds a fenced block after leading prose", () => {
    expect(extractJson('Sure, here it is:\n```\n{"ok":true}\n```')).toEqual({
      found: true,
      json: '{"ok":true}',
    });
  });

  it("ignores braces inside strings and trailing prose", () => {
    expect(
      extractJson('Verdict: {"note": "use } carefully", "n": {"x": 1}} Thanks!')
    ).toEqual({
      found: true,
      json: '{"note": "use } carefully", "n": {"x": 1}}',
    });
  });

  it("handles escaped quotes inside strings", () => {
    expect(extractJson('{"q": "say \\"}\\" twice"}')).toEqual({
      found: true,
      json: '{"q": "say \\"}\\" twice"}',
    });
  });

  it("extracts an array when it comes first", () => {
    expect(extractJson('[1, {"a": 2}] and {"b": 3}')).toEqual({
      found: true,
      json: '[1, {"a": 2}]',
    });
  });

  it("skips bracketed prose that is not JSON", () => {
    expect(extractJson('Assessment [1-5 scale] follows:\n{"score": 4}')).toEqual({
      found: true,
      json: '{"score": 4}',
    });
  });

  it("returns the first balanced span when nothing parses", () => {
    expect(extractJson("Note [see above] and {broken: 1}")).toEqual({
      found: true,
      json: "[see above]",
    });
  });

  it("reports content without JSON", () => {
    expect(extractJson("I think it went well.")).toEqual({
      found: false,
      reason: "No JSON object or array found in content",
    });
  });

  it("reports an unclosed object", () => {
    expect(extractJson('{"a": 1')).toEqual({
      found: false,
      reason: "Unclosed JSON bracket",
    });
  });

  it("reports empty content", () => {
    expect(extractJson("   ")).toEqual({
      found: false,
      reason: "Empty content after strip",
    });
  });
});
