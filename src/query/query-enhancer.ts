/**
 * Query Enhancer
 * Lexicon-driven rewrite of a raw question into a retrieval-friendly query.
 *
 * Pure pattern matching: no external calls, same output for the same input and lexicon.
 * A question that matches nothing comes back byte-for-byte unchanged with intent "general".
 */

import { INTENTS, type Intent, type Lexicon } from "../schemas/lexicon.js";
import type { AmountRole, EnhancedQuery, QueryEntity } from "../schemas/answer.js";

const AMOUNT_PATTERN =
  /(\$\s?)?(\d{1,3}(?:,\d{3})+|\d+)(\.\d+)?(?:\s?(k|m|thousand|million)\b)?(?:\s?(dollars|aud)\b)?/gi;
const AGE_PATTERN = /\b(?:aged?\s+|i'm\s+|i am\s+)(\d{1,3})\b(?!\s*(?:k|%|dollars))|\b(\d{1,3})[\s-]?(?:years?|yrs?)[\s-]?old\b/gi;
const FINANCIAL_YEAR_PATTERN = /\b(?:fy\s?)?((?:19|20)\d{2})[-/](\d{2})\b/gi;
const YEAR_PATTERN = /\b((?:19|20)\d{2})\b/g;
const TICKER_PATTERN = /\b[A-Z][A-Z0-9]{1,4}\b/g;

// Cues are looked for in the same sentence, nearest first
const ROLE_WINDOW = 48;
const SENTENCE_BREAK = /[.?!;](?:\s|$)/;
const ROLE_CUES: Array<{ role: Exclude<AmountRole, "other">; pattern: RegExp }> = [
  {
    role: "sacrifice",
    pattern: /\bsacrific\w*|\bsalary sac\b|\bcontribut\w*|\bput(?:ting)?\b|\b(?:into|to)\s+(?:my\s+)?super\b/gi,
  },
  { role: "income", pattern: /\bearn\w*|\bincome\b|\bsalary\b(?!\s+sac)|\bpaid\b|\bwages?\b|\bmake\b/gi },
];

const MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  thousand: 1_000,
  m: 1_000_000,
  million: 1_000_000,
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-term matcher. Terms containing capitals match case-sensitively (ATO, ETF);
 * lower-case terms match any casing.
 */
function termPattern(term: string): RegExp {
  const flags = term === term.toLowerCase() ? "i" : "";
  return new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(term)}(?![A-Za-z0-9])`, flags);
}

interface Span {
  start: number;
  end: number;
}

const overlaps = (a: Span, b: Span) => a.start < b.end && b.start < a.end;

export class QueryEnhancer {
  private readonly abbreviations: Array<{ term: string; expansion: string; pattern: RegExp }>;
  private readonly keywords: Array<{ intent: Intent; patterns: RegExp[] }>;

  constructor(private readonly lexicon: Lexicon) {
    this.abbreviations = Object.entries(lexicon.abbreviations).map(([term, expansion]) => ({
      term,
      expansion,
      pattern: termPattern(term),
    }));

    this.keywords = INTENTS.filter((i): i is Exclude<Intent, "general"> => i !== "general").map((intent) => ({
      intent,
      patterns: lexicon.intentKeywords[intent].map(termPattern),
    }));
  }

  enhance(rawQuery: string): EnhancedQuery {
    const entities = this.extractEntities(rawQuery);
    const intent = this.classify(rawQuery);
    const additions: string[] = [];

    for (const { expansion, pattern } of this.abbreviations) {
      if (pattern.test(rawQuery)) additions.push(expansion);
    }

    for (const entity of entities) {
      if (entity.kind === "ticker") additions.push(entity.name);
      if (entity.kind === "date" && entity.value.includes("-")) additions.push(`financial year ${entity.value}`);
    }

    const context = intent === "general" ? undefined : this.lexicon.intentContext[intent];
    if (context) additions.push(context);

    return {
      original: rawQuery,
      query: appendTerms(rawQuery, additions),
      intent,
      entities,
    };
  }

  /**
   * Highest keyword count wins; ties resolve in intent declaration order
   */
  classify(rawQuery: string): Intent {
    let best: Intent = "general";
    let bestScore = 0;

    for (const { intent, patterns } of this.keywords) {
      const score = patterns.filter((p) => p.test(rawQuery)).length;
      if (score > bestScore) {
        best = intent;
        bestScore = score;
      }
    }

    return best;
  }

  extractEntities(rawQuery: string): QueryEntity[] {
    const found: Array<{ span: Span; entity: QueryEntity }> = [];
    const claim = (span: Span, entity: QueryEntity) => {
      if (!found.some((f) => overlaps(f.span, span))) found.push({ span, entity });
    };

    // Dates first so "2025-26" is never read as an amount
    for (const m of rawQuery.matchAll(FINANCIAL_YEAR_PATTERN)) {
      claim(spanOf(m), { kind: "date", value: `${m[1]}-${m[2]}`, text: m[0] });
    }

    for (const m of rawQuery.matchAll(AGE_PATTERN)) {
      const value = Number(m[1] ?? m[2]);
      if (value > 0 && value <= 120) claim(spanOf(m), { kind: "age", value, text: m[0] });
    }

    for (const m of rawQuery.matchAll(AMOUNT_PATTERN)) {
      const [, dollar, digits, fraction, scale, currency] = m;
      if (!dollar && !scale && !currency) continue;
      const multiplier = scale ? MULTIPLIERS[scale.toLowerCase()] : 1;
      const value = Number(`${digits.replace(/,/g, "")}${fraction ?? ""}`) * multiplier;
      const span = spanOf(m);
      claim(span, { kind: "amount", value, text: m[0].trim(), role: amountRole(rawQuery, span) });
    }

    for (const m of rawQuery.matchAll(YEAR_PATTERN)) {
      claim(spanOf(m), { kind: "date", value: m[1], text: m[0] });
    }

    for (const m of rawQuery.matchAll(TICKER_PATTERN)) {
      const name = this.lexicon.tickers[m[0]];
      if (name) claim(spanOf(m), { kind: "ticker", symbol: m[0], name, text: m[0] });
    }

    return found.sort((a, b) => a.span.start - b.span.start).map((f) => f.entity);
  }
}

function spanOf(match: RegExpMatchArray): Span {
  const start = match.index ?? 0;
  return { start, end: start + match[0].length };
}

function cuesIn(text: string): Array<{ role: AmountRole } & Span> {
  return ROLE_CUES.flatMap(({ role, pattern }) => [...text.matchAll(pattern)].map((m) => ({ role, ...spanOf(m) })));
}

/**
 * The closest cue before the amount wins; failing that, the first one after it
 */
function amountRole(text: string, span: Span): AmountRole {
  const before = text.slice(Math.max(0, span.start - ROLE_WINDOW), span.start).split(SENTENCE_BREAK).pop() ?? "";
  const preceding = cuesIn(before).sort((a, b) => b.end - a.end)[0];
  if (preceding) return preceding.role;

  const after = text.slice(span.end, span.end + ROLE_WINDOW).split(SENTENCE_BREAK)[0];
  const following = cuesIn(after).sort((a, b) => a.start - b.start)[0];
  return following?.role ?? "other";
}

/**
 * Append terms the query does not already contain, skipping words an earlier
 * addition already brought in; no additions means no change at all
 */
function appendTerms(query: string, terms: string[]): string {
  const lower = query.toLowerCase();
  const added = new Set<string>();
  const words: string[] = [];

  for (const term of terms) {
    if (lower.includes(term.toLowerCase())) continue;
    for (const word of term.split(/\s+/)) {
      const key = word.toLowerCase();
      if (!word || added.has(key)) continue;
      added.add(key);
      words.push(word);
    }
  }

  return words.length === 0 ? query : `${query} ${words.join(" ")}`;
}
