/**
 * Claude Generation Backend
 * Single-turn, tool-less answer generation through the Claude Agent SDK
 */

import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import { BackendFailureError } from "../../core/errors.js";
import { logger, type ChildLogger } from "../../core/logger.js";
import { getAnswerSystemPrompt, getAnswerUserPrompt } from "../../synthesis/prompts.js";
import type { GenerationBackend, GenerationRequest } from "../../synthesis/types.js";

export interface ClaudeGenerationOptions {
  model: string;
  apiKey?: string;
}

export class ClaudeGenerationBackend implements GenerationBackend {
  readonly name = "claude";
  private log: ChildLogger;

  constructor(private readonly options: ClaudeGenerationOptions) {
    this.log = logger.child({ component: "claude", model: options.model });
  }

  /**
   * Check if an API key is available
   */
  isReady(): boolean {
    return Boolean(this.options.apiKey ?? process.env.ANTHROPIC_API_KEY);
  }

  async complete(request: GenerationRequest): Promise<string> {
    const startTime = Date.now();
    const abortController = new AbortController();
    request.signal?.addEventListener("abort", () => abortController.abort(), { once: true });

    const options: Options = {
      systemPrompt: getAnswerSystemPrompt(),
      model: this.options.model,
      maxTurns: 1,
      allowedTools: [],
      abortController,
      ...(this.options.apiKey ? { env: { ...process.env, ANTHROPIC_API_KEY: this.options.apiKey } } : {}),
    };

    const result = query({ prompt: getAnswerUserPrompt(request), options });

    let output = "";
    let finalResult: string | undefined;

    for await (const message of result) {
      if (message.type === "assistant") {
        for (const block of message.message.content) {
          if (block.type === "text") {
            output += block.text;
          }
        }
      } else if (message.type === "result") {
        if (message.subtype === "success") {
          finalResult = message.result;
          this.log.metric("generation_cost_usd", message.total_cost_usd);
        } else {
          throw new BackendFailureError(`Claude generation ended with ${message.subtype}`, this.name, {
            context: { subtype: message.subtype },
          });
        }
      }
    }

    const text = output || finalResult || "";
    this.log.debug("Generation complete", { chars: text.length, durationMs: Date.now() - startTime });
    return text;
  }
}
