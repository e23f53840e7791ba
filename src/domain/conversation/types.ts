import { InvalidInputError } from "@domain/errors";

export const DEFAULT_CHAT_ROOM_ID = "default";

export type TurnRole = "user" | "assistant";

export const TURN_ROLES: readonly TurnRole[] = ["user", "assistant"];

export interface ConversationKey {
  readonly userId: string;
  readonly chatRoomId: string;
}

export interface Turn {
  userId: string;
  chatRoomId: string;
  role: TurnRole;
  text: string;
  /** ISO-8601 time the store accepted the turn. */
  timestamp: string;
  sequenceNo: number;
  /** Chat request that produced the turn; repeated appends with the same id and role are no-ops. */
  requestId?: string;
}

/**
 * Raw identifiers as callers send them. `chatId` and `chatRoomId` are the two
 * historical names for the same thing.
 */
export interface ConversationKeyInput {
  userId: string | undefined | null;
  chatId?: string | null;
  chatRoomId?: string | null;
}

const ID_PATTERN = /^[A-Za-z0-9_.:@-]+$/;
const MAX_ID_LENGTH = 128;

export function validateId(value: string, field: string): string {
  const trimmed = value.trim();

  if (!trimmed) {
    throw new InvalidInputError(`${field} is required`, { field });
  }

  if (trimmed.length > MAX_ID_LENGTH || !ID_PATTERN.test(trimmed)) {
    throw new InvalidInputError(`${field} is malformed`, { field });
  }

  return trimmed;
}

/**
 * Resolves the legacy field names into the canonical key:
 * chat_id first, then chat_room_id, then the default room.
 */
export function normalizeConversationKey(input: ConversationKeyInput): ConversationKey {
  const userId = validateId(input.userId ?? "", "userId");

  const candidates = [input.chatId, input.chatRoomId];
  const room = candidates.find(
    (value): value is string => typeof value === "string" && value.trim() !== ""
  );

  return {
    userId,
    chatRoomId: room === undefined ? DEFAULT_CHAT_ROOM_ID : validateId(room, "chatRoomId"),
  };
}

/**
 * Storage and queue key for a conversation. Ids may contain `:`, so each
 * part is percent-encoded and the separator can only come from here.
 */
export function conversationKeyToString(key: ConversationKey): string {
  return `${encodeURIComponent(key.userId)}:${encodeURIComponent(key.chatRoomId)}`;
}

export function isTurnRole(value: unknown): value is TurnRole {
  return value === "user" || value === "assistant";
}
