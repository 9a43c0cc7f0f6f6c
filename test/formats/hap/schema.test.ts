/**
 * Tests for the schema registry and header lines
 */

import { describe, expect, test } from "vitest";
import {
  DuplicateFieldError,
  MalformedLineError,
  SchemaFrozenError,
  ValidationError,
} from "../../../src/errors";
import {
  formatDeclaration,
  formatHeaderLines,
  HeaderBuilder,
  isDeclarationLine,
} from "../../../src/formats/hap/header";
import { SchemaRegistry } from "../../../src/formats/hap/schema";

describe("SchemaRegistry", () => {
  test("keeps declaration order per line type", () => {
    const registry = new SchemaRegistry();
    registry.declare("H", "beta", ".2f", "Effect size");
    registry.declare("V", "score", "d");
    registry.declare("H", "ancestry", "s", "Population");

    expect(registry.fieldsFor("H").map((f) => f.name)).toEqual(["beta", "ancestry"]);
    expect(registry.fieldsFor("V").map((f) => f.name)).toEqual(["score"]);
    expect(registry.declarations().map((f) => f.name)).toEqual(["beta", "score", "ancestry"]);
    expect(registry.field("H", "beta")?.format).toEqual({ kind: "float", tag: ".2f", precision: 2 });
    expect(registry.field("V", "beta")).toBeUndefined();
  });

  test("the same name may be declared once per line type", () => {
    const registry = new SchemaRegistry();
    registry.declare("H", "score", "d");
    registry.declare("V", "score", "d");

    expect(() => registry.declare("H", "score", "f", "", 7)).toThrow(DuplicateFieldError);
    try {
      registry.declare("V", "score", "d", "", 9);
    } catch (error) {
      expect(error).toMatchObject({ lineType: "V", fieldName: "score", lineNumber: 9 });
    }
  });

  test("a frozen registry rejects declarations", () => {
    const registry = new SchemaRegistry().freeze();

    expect(registry.isFrozen).toBe(true);
    expect(() => registry.declare("H", "beta", ".2f")).toThrow(SchemaFrozenError);
  });

  test("rejects invalid names and descriptions", () => {
    const registry = new SchemaRegistry();

    expect(() => registry.declare("H", "", "d")).toThrow(ValidationError);
    expect(() => registry.declare("H", "two words", "d")).toThrow(/Invalid field name/);
    expect(() => registry.declare("H", "beta", "d", "line\nbreak")).toThrow(/single line/);
    expect(() => registry.declare("H", "beta", "q")).toThrow(/Unsupported format tag/);
  });

  test("fromDeclarations builds a frozen registry", () => {
    const registry = SchemaRegistry.fromDeclarations([
      { lineType: "H", name: "beta", formatTag: ".2f", description: "Effect size" },
      { lineType: "V", name: "score", formatTag: "d" },
    ]);

    expect(registry.isFrozen).toBe(true);
    expect(registry.field("V", "score")?.description).toBe("");
    expect(SchemaRegistry.fromDeclarations(registry.declarations()).equals(registry)).toBe(true);
  });

  test("equals compares names, order and tags but not descriptions", () => {
    const base = SchemaRegistry.fromDeclarations([
      { lineType: "H", name: "a", formatTag: "d", description: "one" },
      { lineType: "H", name: "b", formatTag: "s" },
    ]);
    const relabelled = SchemaRegistry.fromDeclarations([
      { lineType: "H", name: "a", formatTag: "d", description: "other" },
      { lineType: "H", name: "b", formatTag: "s" },
    ]);
    const reordered = SchemaRegistry.fromDeclarations([
      { lineType: "H", name: "b", formatTag: "s" },
      { lineType: "H", name: "a", formatTag: "d" },
    ]);
    const retagged = SchemaRegistry.fromDeclarations([
      { lineType: "H", name: "a", formatTag: "f" },
      { lineType: "H", name: "b", formatTag: "s" },
    ]);

    expect(base.equals(relabelled)).toBe(true);
    expect(base.equals(reordered)).toBe(false);
    expect(base.equals(retagged)).toBe(false);
    expect(base.equals(new SchemaRegistry())).toBe(false);
  });
});

describe("header lines", () => {
  test("isDeclarationLine needs the tab after the symbol", () => {
    expect(isDeclarationLine("#H\tbeta\t.2f\tEffect")).toBe(true);
    expect(isDeclarationLine("#V\tscore\td\t")).toBe(true);
    expect(isDeclarationLine("#Haplotypes from cohort A")).toBe(false);
    expect(isDeclarationLine("# H\tbeta")).toBe(false);
  });

  test("HeaderBuilder separates comments from declarations", () => {
    const builder = new HeaderBuilder();
    builder.addLine("# cohort A", 1);
    builder.addLine("#H\tbeta\t.2f\tEffect size", 2);
    builder.addLine("#V\tnote\ts\tFree\ttext", 3);
    builder.addLine("#version 1", 4);

    const { header, registry } = builder.finish();

    expect(header.comments).toEqual(["# cohort A", "#version 1"]);
    expect(header.declarations.map((d) => [d.lineType, d.name, d.description])).toEqual([
      ["H", "beta", "Effect size"],
      ["V", "note", "Free\ttext"],
    ]);
    expect(registry.isFrozen).toBe(true);
  });

  test("declarations need four columns", () => {
    const builder = new HeaderBuilder();

    expect(() => builder.addLine("#H\tbeta\t.2f", 3)).toThrow(MalformedLineError);
    expect(() => builder.addLine("#H\tbeta", 3)).toThrow(/4 columns/);
  });

  test("unsupported tags in a header are malformed lines", () => {
    const builder = new HeaderBuilder();

    try {
      builder.addLine("#V\tscore\tint\tScore", 5);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedLineError);
      expect(error).toMatchObject({ lineNumber: 5, lineType: "V" });
    }
  });

  test("duplicate declarations report their line", () => {
    const builder = new HeaderBuilder();
    builder.addLine("#H\tbeta\t.2f\t", 1);

    expect(() => builder.addLine("#H\tbeta\td\t", 2)).toThrow(DuplicateFieldError);
  });

  test("formatHeaderLines writes comments then declarations", () => {
    const registry = SchemaRegistry.fromDeclarations([
      { lineType: "H", name: "beta", formatTag: ".2f", description: "Effect size" },
      { lineType: "V", name: "score", formatTag: "d" },
    ]);

    expect(formatHeaderLines(["# cohort A"], registry)).toEqual([
      "# cohort A",
      "#H\tbeta\t.2f\tEffect size",
      "#V\tscore\td\t",
    ]);
    const first = registry.declarations()[0];
    expect(first === undefined ? "" : formatDeclaration(first)).toBe("#H\tbeta\t.2f\tEffect size");
  });

  test("formatHeaderLines rejects comments that are not plain # lines", () => {
    const registry = new SchemaRegistry().freeze();

    expect(() => formatHeaderLines(["no hash"], registry)).toThrow(ValidationError);
    expect(() => formatHeaderLines(["#two\nlines"], registry)).toThrow(ValidationError);
    expect(() => formatHeaderLines(["#H\tbeta\t.2f\tsneaky"], registry)).toThrow(/field declaration/);
  });
});
