import type { ConversationKey, Turn, TurnRole } from "@domain/conversation/types";

export interface AppendOptions {
  requestId?: string;
}

export interface TurnInput {
  role: TurnRole;
  text: string;
}

/**
 * Ordered, append-only turn log per conversation key.
 */
export interface ConversationLog {
  /** Numbers the turn and writes it durably before resolving. */
  append(
    key: ConversationKey,
    role: TurnRole,
    text: string,
    options?: AppendOptions
  ): Promise<Turn>;

  /**
   * Numbers the turns and makes them visible to readers right away; the
   * durable write waits for `commit`.
   */
  stage(key: ConversationKey, turns: readonly TurnInput[], options?: AppendOptions): Promise<Turn[]>;

  /** Writes staged turns up to and including `throughSequenceNo`; resolves with how many. */
  commit(key: ConversationKey, throughSequenceNo: number): Promise<number>;

  /** Up to `limit` most recent turns, oldest first, staged ones included. */
  recent(key: ConversationKey, limit: number): Promise<Turn[]>;

  clear(key: ConversationKey): Promise<number>;

  lastSequenceNo(key: ConversationKey): Promise<number>;
}
