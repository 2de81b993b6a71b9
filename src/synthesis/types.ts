/**
 * Generation backend seam
 */

import type { CalculationResult } from "../schemas/calculation.js";

export interface ContextSource {
  id: string;
  text: string;
  authority: string;
  title?: string;
}

export interface GenerationRequest {
  /** Serialised calculation facts and tagged passages */
  context: string;
  /** The question exactly as the user asked it */
  query: string;
  signal?: AbortSignal;
  /** Structured view of the same context, for backends that do not read prose */
  sources?: ContextSource[];
  calculation?: CalculationResult;
}

export interface GenerationBackend {
  readonly name: string;
  complete(request: GenerationRequest): Promise<string>;
}
