/**
 * Zod schemas for the files the pipeline reads and the edits reviewers send.
 */

import { z } from "zod";
import { CHOICE_LABELS } from "@/lib/ingest/types";

// ---------------------------------------------------------------------------
// Reusable atoms
// ---------------------------------------------------------------------------

export const choiceLabelSchema = z.enum(CHOICE_LABELS);
export const domainIdSchema = z.string().min(1, "Domain id is required").max(100).trim();
export const sha256Schema = z.string().regex(/^[0-9a-f]{64}$/, "Expected a SHA-256 hex digest");

export const choiceSchema = z.object({
  label: choiceLabelSchema,
  text: z.string().min(1, "Choice text is required"),
});

// ---------------------------------------------------------------------------
// Domain taxonomy (config/domains.json)
// ---------------------------------------------------------------------------

export const domainSchema = z.object({
  id: domainIdSchema,
  name: z.string().min(1, "Domain name is required"),
  keywords: z.array(z.string().min(1)).default([]),
});

export const taxonomySchema = z
  .object({
    domains: z.array(domainSchema).min(1, "At least one domain is required"),
    default_domain: domainIdSchema,
  })
  .refine((t) => t.domains.some((d) => d.id === t.default_domain), {
    message: "default_domain must name one of the domains",
    path: ["default_domain"],
  });

export type Domain = z.infer<typeof domainSchema>;
export type Taxonomy = z.infer<typeof taxonomySchema>;

// ---------------------------------------------------------------------------
// Reviewer edits, keyed by stable id
// ---------------------------------------------------------------------------

export const questionEditSchema = z.object({
  skip: z.boolean().optional(),
  text: z.string().min(1).optional(),
  choices: z.array(choiceSchema).optional(),
  correctAnswers: z.array(choiceLabelSchema).optional(),
  domainId: domainIdSchema.optional(),
});

export const questionEditsSchema = z.record(z.string(), questionEditSchema);

export type QuestionEdit = z.infer<typeof questionEditSchema>;

// ---------------------------------------------------------------------------
// Import ledger (data/import-ledger.json)
// ---------------------------------------------------------------------------

export const importStatusSchema = z.enum(["completed", "failed"]);

export const ledgerEntrySchema = z.object({
  filename: z.string().min(1),
  fileHash: sha256Schema,
  status: importStatusSchema,
  questionsImported: z.number().int().nonnegative(),
  importedAt: z.string().datetime(),
});

export const ledgerFileSchema = z.object({
  entries: z.array(ledgerEntrySchema),
});

export type LedgerEntry = z.infer<typeof ledgerEntrySchema>;
export type ImportStatus = z.infer<typeof importStatusSchema>;

// ---------------------------------------------------------------------------
// Demo questions (config/demo-questions.json)
// ---------------------------------------------------------------------------

export const demoQuestionSchema = z.object({
  text: z.string().min(1),
  choices: z.array(choiceSchema).min(2),
  correctAnswers: z.array(choiceLabelSchema).min(1),
  explanation: z.string().nullable().default(null),
  questionType: z.enum(["single", "multi", "truefalse"]).default("single"),
  domainId: domainIdSchema,
});

export const demoQuestionsFileSchema = z.array(demoQuestionSchema);

export type DemoQuestion = z.infer<typeof demoQuestionSchema>;
