/**
 * Mastra agent over an OpenAI chat model: the generation side of the
 * assistant.
 *
 * The assembled context becomes system sections (profile, memory, retrieved
 * products), the trimmed history becomes chat messages, and the pending user
 * message goes last. Any failure surfaces as GenerationUnavailableError; the
 * caller decides whether to retry.
 */
import { createOpenAI } from "@ai-sdk/openai";
import { Agent } from "@mastra/core/agent";

import { config } from "@config/index";
import { renderContext } from "@domain/context/ContextAssembler";
import type { Context } from "@domain/context/types";
import { GenerationUnavailableError, InfrastructureError, errorMessage } from "@domain/errors";
import type { GenerationMessage, GenerationPort } from "@domain/llm/ports";
import { logEvent } from "@infrastructure/logging/Logger";

export const SKINCARE_INSTRUCTIONS = `
You are a skincare recommendation assistant for an online cosmetics shop.
Users mostly write in Persian; answer in the language of the user's message.

CONTEXT INPUTS:
- USER PROFILE: what the user explicitly told us about themselves.
- MEMORY: facts inferred from earlier conversations (skin type, concerns, age).
- PRODUCT CONTEXT: catalog products retrieved for this message, best match first.

RULES:
1. Recommend only products listed in PRODUCT CONTEXT, and name them as listed.
2. Tailor advice to the skin type and concerns in USER PROFILE, then MEMORY.
   The profile wins when the two disagree.
3. If the skin type is unknown and it matters for the answer, ask for it.
4. If no listed product fits, say so plainly instead of inventing one.
5. Never give medical diagnoses; suggest a dermatologist for persistent problems.
6. Be concise and friendly.
`;

export interface AgentLike {
  generate(messages: GenerationMessage[]): Promise<{ text: string }>;
}

export function buildMessages(context: Context): GenerationMessage[] {
  const earlier: GenerationMessage[] = context.history
    .filter((turn) => !turn.pending)
    .map((turn) => ({ role: turn.role, content: turn.text }));

  return [
    { role: "system", content: renderContext(context) },
    ...earlier,
    { role: "user", content: context.pending.text },
  ];
}

function createSkincareAgent(model: string): AgentLike {
  if (!config.openai.key) {
    throw new InfrastructureError("OPENAI_API_KEY is required for reply generation", 500);
  }

  const provider = createOpenAI({
    apiKey: config.openai.key,
    baseURL: config.openai.baseUrl,
  });

  const mastra = new Agent({
    name: "skincare-agent",
    instructions: SKINCARE_INSTRUCTIONS,
    model: provider(model),
  });

  return {
    async generate(messages) {
      const result = await mastra.generate(
        messages as Parameters<(typeof mastra)["generate"]>[0]
      );
      return { text: result.text };
    },
  };
}

export class MastraGenerationAdapter implements GenerationPort {
  readonly model: string;
  private readonly agent: AgentLike;

  constructor(options: { model?: string; agent?: AgentLike } = {}) {
    this.model = options.model ?? config.openai.model;
    this.agent = options.agent ?? createSkincareAgent(this.model);
  }

  async generate(context: Context): Promise<string> {
    const messages = buildMessages(context);
    const startedAt = Date.now();

    try {
      const { text } = await this.agent.generate(messages);
      const reply = text.trim();

      if (!reply) {
        throw new Error("Model returned an empty reply");
      }

      logEvent("LLM_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        messageCount: messages.length,
        retrieved: context.retrieved.length,
        replyLength: reply.length,
      });

      return reply;
    } catch (error: unknown) {
      logEvent("LLM_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        message: errorMessage(error),
        name: error instanceof Error ? error.name : undefined,
      });

      throw new GenerationUnavailableError("Reply generation failed", error, {
        model: this.model,
      });
    }
  }
}
