/**
 * Citation markers
 * Completions are untrusted text: markers are parsed against an allow-list of
 * passage ids that were actually placed in the context, and everything else is stripped.
 */

export const citationMarker = (passageId: string): string => `[source:${passageId}]`;

const MARKER_PATTERN = /([ \t]*)\[\s*source\s*:\s*([^[\]\s]{1,200})\s*\]/gi;
/** Unterminated, empty or nested leftovers such as "[source:" or "[source: ]" */
const RESIDUAL_PATTERN = /[ \t]*\[\s*source\s*:[^\]\n\u0000]*\]?/gi;
const PLACEHOLDER = /\u0000(\d+)\u0000/g;

export interface CitationCheck {
  text: string;
  /** Allowed ids in first-use order, without duplicates */
  citations: string[];
  /** Raw markers that were removed */
  rejected: string[];
}

export function validateCitations(completion: string, allowed: ReadonlySet<string>): CitationCheck {
  const citations: string[] = [];
  const rejected: string[] = [];
  const kept: string[] = [];

  let text = completion.replace(/\u0000/g, "");

  text = text.replace(MARKER_PATTERN, (marker: string, lead: string, id: string) => {
    if (!allowed.has(id)) {
      rejected.push(marker.trim());
      return "";
    }
    if (!citations.includes(id)) citations.push(id);
    kept.push(citationMarker(id));
    return `${lead}\u0000${kept.length - 1}\u0000`;
  });

  text = text.replace(RESIDUAL_PATTERN, (fragment: string) => {
    rejected.push(fragment.trim());
    return "";
  });

  text = text.replace(PLACEHOLDER, (_match: string, index: string) => kept[Number(index)]);

  return { text: text.trim(), citations, rejected };
}
