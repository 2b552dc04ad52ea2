import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  booleanField,
  confidenceField,
  decodeModelJson,
  extractJson,
  integerField,
  nameField,
  objectListField,
  stringListField,
} from "../../services/intent-resolution/modelJson";

describe("extractJson", () => {
  it("returns bare JSON unchanged", () => {
    expect(extractJson('{"a": 1}')).toBe('{"a": 1}');
    expect(extractJson("  [1, 2]  ")).toBe("[1, 2]");
  });

  it("prefers a fenced block", () => {
    expect(extractJson('Sure!\n```json\n{"a": 1}\n```\nAnything else?')).toBe('{"a": 1}');
  });

  it("accepts a fence without a language tag", () => {
    expect(extractJson("```\n[1]\n```")).toBe("[1]");
  });

  it("cuts JSON out of surrounding prose", () => {
    expect(extractJson('Here you go: {"a": {"b": 2}} hope it helps')).toBe('{"a": {"b": 2}}');
  });

  it("starts at whichever bracket comes first", () => {
    expect(extractJson('Answer: ["x", {"y": 1}] done')).toBe('["x", {"y": 1}]');
  });

  it("returns null when there is nothing JSON-like", () => {
    expect(extractJson("no json here")).toBeNull();
    expect(extractJson("")).toBeNull();
    expect(extractJson("closing } before { opening")).toBeNull();
  });
});

describe("decodeModelJson", () => {
  const schema = z.object({ name: nameField("unknown"), score: confidenceField(0) });

  it("decodes and applies defaults", () => {
    expect(decodeModelJson('{"score": 0.4}', schema)).toEqual({ ok: true, value: { name: "unknown", score: 0.4 } });
  });

  it("reports missing JSON", () => {
    const result = decodeModelJson("I could not decide", schema);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("no_json");
      expect(result.error.raw).toBe("I could not decide");
    }
  });

  it("reports invalid JSON", () => {
    const result = decodeModelJson("{name: 'x'}", schema);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("invalid_json");
  });

  it("decodes JSON followed by trailing prose", () => {
    expect(decodeModelJson('{"name": "billing", "score": 0.9}\nHope this helps!', schema)).toEqual({
      ok: true,
      value: { name: "billing", score: 0.9 },
    });
  });

  it("still reports invalid JSON when the trimmed span is broken too", () => {
    const result = decodeModelJson('{"name": "billing",}\nthanks', schema);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("invalid_json");
  });

  it("reports a schema mismatch at the root", () => {
    const result = decodeModelJson("[1, 2]", schema);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("schema");
  });
});

describe("field helpers", () => {
  it("clamps confidences and parses numeric strings", () => {
    const field = confidenceField(0.5);
    expect(field.parse(1.7)).toBe(1);
    expect(field.parse(-0.2)).toBe(0);
    expect(field.parse("0.25")).toBe(0.25);
    expect(field.parse("high")).toBe(0.5);
    expect(field.parse(undefined)).toBe(0.5);
  });

  it("truncates integers", () => {
    expect(integerField(0).parse(2.9)).toBe(2);
    expect(integerField(7).parse(null)).toBe(7);
  });

  it("accepts boolean strings", () => {
    expect(booleanField(true).parse("false")).toBe(false);
    expect(booleanField(false).parse("true")).toBe(true);
    expect(booleanField(true).parse("maybe")).toBe(true);
  });

  it("trims names and replaces blank ones", () => {
    expect(nameField("unknown").parse("  billing  ")).toBe("billing");
    expect(nameField("unknown").parse("   ")).toBe("unknown");
  });

  it("keeps only non-empty strings in a string list", () => {
    expect(stringListField().parse(["a ", 3, "", null, "b"])).toEqual(["a", "b"]);
    expect(stringListField().parse("not a list")).toEqual([]);
  });

  it("drops object list elements the item schema rejects", () => {
    const field = objectListField(z.object({ id: z.number() }));
    expect(field.parse([{ id: 1 }, { id: "two" }, "three", { id: 4 }])).toEqual([{ id: 1 }, { id: 4 }]);
    expect(field.parse(undefined)).toEqual([]);
  });
});
