/**
 * Generation Prompts
 * System and user prompts for LLM-backed answer generation
 */

import type { GenerationRequest } from "./types.js";

export const UNANSWERABLE_MESSAGE =
  "I don't have enough reliable information to answer that question. Try rephrasing it, or add your age, income and expenses so I can calculate figures for you.";

export const GENERAL_ADVICE_DISCLAIMER =
  "This is general information only and does not consider your personal circumstances. Consider speaking with a licensed financial adviser before acting on it.";

export function getAnswerSystemPrompt(): string {
  return `You are an Australian personal-finance assistant.

## Rules
- Answer only from the context you are given. If the context does not cover the question, say so.
- Every statement that relies on a passage must cite it with a marker of the exact form [source:<passage-id>], using an id that appears in the context.
- Never invent passage ids, URLs or statistics.
- When the context contains calculated figures, quote them exactly as written (e.g. $18,000.00, 30%). Do not recalculate them.
- Amounts are Australian dollars. Refer to the ATO, super funds and Australian products where relevant.
- Keep the answer under 250 words. Plain prose or short bullet points.
- End with one sentence noting that this is general information, not personal advice.`;
}

export function getAnswerUserPrompt(request: GenerationRequest): string {
  return `## Context
${request.context || "(no context available)"}

## Question
${request.query}

Answer the question using the context above, with [source:<passage-id>] citations.`;
}
