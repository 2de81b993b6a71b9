/**
 * Generation context
 * Calculated facts first, then passages in ranking order, within a character budget.
 * Over budget, passages are dropped from the bottom; a top passage that alone
 * exceeds the budget is clipped instead.
 */

import type { RetrievalHit } from "../schemas/answer.js";
import type { CalculationResult } from "../schemas/calculation.js";
import { formatField } from "../calculator/fields.js";
import { citationMarker } from "./citations.js";
import type { ContextSource } from "./types.js";

const CLIP_SUFFIX = " ...[truncated]";

export interface BuiltContext {
  text: string;
  /** Ids of passages that made it into the context, in ranking order */
  passageIds: string[];
  sources: ContextSource[];
}

export function renderCalculation(calculation: CalculationResult): string {
  const lines = [`Calculated figures (${calculation.kind}, rules ${calculation.ruleVersion}):`];
  for (const f of calculation.fields) {
    lines.push(`- ${f.label}: ${formatField(f)}`);
  }
  for (const [key, value] of Object.entries(calculation.notes ?? {})) {
    lines.push(`- ${key}: ${value}`);
  }
  if (calculation.warnings.length > 0) {
    lines.push("Warnings:");
    for (const w of calculation.warnings) lines.push(`- ${w.message}`);
  }
  return lines.join("\n");
}

function passageHeader(hit: RetrievalHit): string {
  const { id, metadata } = hit.passage;
  const origin = metadata.publishedAt ? `${metadata.authority}, ${metadata.publishedAt}` : metadata.authority;
  const title = metadata.title ? ` ${metadata.title}` : "";
  return `${citationMarker(id)}${title} (${origin})`;
}

export function buildContext(
  hits: readonly RetrievalHit[],
  calculation: CalculationResult | undefined,
  maxChars: number
): BuiltContext {
  const blocks: string[] = [];
  const passageIds: string[] = [];
  const sources: ContextSource[] = [];

  if (calculation) blocks.push(renderCalculation(calculation));

  let used = blocks.reduce((n, b) => n + b.length, 0);

  for (const [rank, hit] of hits.entries()) {
    const header = passageHeader(hit);
    const separator = blocks.length > 0 ? 2 : 0;
    let text = hit.passage.text;
    let block = `${header}\n${text}`;

    if (used + separator + block.length > maxChars) {
      const room = maxChars - used - separator - header.length - 1 - CLIP_SUFFIX.length;
      if (rank !== 0 || room <= 0) break;
      text = `${text.slice(0, room).trimEnd()}${CLIP_SUFFIX}`;
      block = `${header}\n${text}`;
    }

    blocks.push(block);
    used += separator + block.length;
    passageIds.push(hit.passage.id);
    sources.push({
      id: hit.passage.id,
      text,
      authority: hit.passage.metadata.authority,
      title: hit.passage.metadata.title,
    });
  }

  return { text: blocks.join("\n\n"), passageIds, sources };
}
