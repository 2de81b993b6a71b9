/**
 * Passage Schema
 * Knowledge-base passages as produced by offline ingestion
 */

import { z } from "zod";

export const PassageIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._:-]{0,127}$/, "passage id must be 1-128 chars of [A-Za-z0-9._:-]");

export const DocumentTypeSchema = z.enum([
  "guide",
  "regulation",
  "statistics",
  "market-data",
  "news",
  "product",
]);

export const PassageMetadataSchema = z.object({
  documentType: DocumentTypeSchema,
  /** ISO date (YYYY-MM-DD) */
  publishedAt: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "publishedAt must be YYYY-MM-DD")
    .optional(),
  /** Issuing body, e.g. "ATO", "ASIC Moneysmart", "ABS" */
  authority: z.string().min(1),
  title: z.string().optional(),
  url: z.string().url().optional(),
});

export const PassageSchema = z.object({
  id: PassageIdSchema,
  text: z.string().min(1),
  metadata: PassageMetadataSchema,
});

export const PassageCollectionSchema = z.object({
  version: z.string(),
  passages: z.array(PassageSchema),
});

export type DocumentType = z.infer<typeof DocumentTypeSchema>;
export type PassageMetadata = z.infer<typeof PassageMetadataSchema>;
export type Passage = z.infer<typeof PassageSchema>;
export type PassageCollection = z.infer<typeof PassageCollectionSchema>;
