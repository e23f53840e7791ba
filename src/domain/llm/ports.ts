import type { Context } from "@domain/context/types";

export interface GenerationMessage {
  role: "user" | "assistant" | "system";
  content: string;
}

/**
 * Produces the assistant reply for an assembled context. Implementations
 * throw GenerationUnavailableError when no reply could be produced.
 */
export interface GenerationPort {
  readonly model: string;
  generate(context: Context): Promise<string>;
}
