import { describe, it, expect } from "vitest";
import {
  demoQuestionSchema,
  ledgerEntrySchema,
  questionEditsSchema,
  taxonomySchema,
  validate,
} from "@/lib/validation";

describe("validate", () => {
  it("returns parsed data with defaults applied", () => {
    const result = validate(taxonomySchema, {
      domains: [{ id: "storage", name: "Storage" }],
      default_domain: "storage",
    });

    expect(result).toEqual({
      ok: true,
      data: { domains: [{ id: "storage", name: "Storage", keywords: [] }], default_domain: "storage" },
    });
  });

  it("prefixes errors with their path", () => {
    const result = validate(taxonomySchema, {
      domains: [{ id: "storage", name: "" }],
      default_domain: "storage",
    });

    expect(result).toEqual({ ok: false, errors: ["domains.0.name: Domain name is required"] });
  });

  it("rejects a default domain that is not defined", () => {
    const result = validate(taxonomySchema, {
      domains: [{ id: "storage", name: "Storage" }],
      default_domain: "compute",
    });

    expect(result).toEqual({ ok: false, errors: ["default_domain: default_domain must name one of the domains"] });
  });

  it("reports errors without a path as plain messages", () => {
    expect(validate(questionEditsSchema, "not an object")).toEqual({
      ok: false,
      errors: ["Expected object, received string"],
    });
  });
});

describe("schemas", () => {
  it("accepts reviewer edits with known choice labels only", () => {
    expect(validate(questionEditsSchema, { abc: { correctAnswers: ["A", "C"] } }).ok).toBe(true);
    expect(validate(questionEditsSchema, { abc: { correctAnswers: ["G"] } }).ok).toBe(false);
  });

  it("requires a SHA-256 hash and ISO time on ledger entries", () => {
    const entry = {
      filename: "exam.pdf",
      fileHash: "0".repeat(64),
      status: "completed",
      questionsImported: 4,
      importedAt: "2026-01-05T10:00:00.000Z",
    };

    expect(validate(ledgerEntrySchema, entry).ok).toBe(true);
    expect(validate(ledgerEntrySchema, { ...entry, importedAt: "yesterday" }).ok).toBe(false);
    expect(validate(ledgerEntrySchema, { ...entry, questionsImported: -1 }).ok).toBe(false);
  });

  it("fills demo question defaults", () => {
    const result = validate(demoQuestionSchema, {
      text: "Which option?",
      choices: [
        { label: "A", text: "First" },
        { label: "B", text: "Second" },
      ],
      correctAnswers: ["A"],
      domainId: "compute",
    });

    expect(result.ok && result.data.questionType).toBe("single");
    expect(result.ok && result.data.explanation).toBeNull();
  });
});
