import { createMessageId, MonotonicIdGenerator } from "@/node/utils/ids";
import { isPlainObject, type JsonObject } from "@/node/storage/dottedPath";
import type { Migration } from "@/node/storage/schemaMigrator";

function readChats(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Chats document (chats.json) history.
 *
 * v0: chats without `starred`; some early chats lack `updatedAt`.
 * v1: every chat has a boolean `starred` and an `updatedAt`.
 * v2: every message has an `id`.
 */
export const CHAT_MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: "backfill starred and updatedAt on chats",
    up: async (store) => {
      const now = new Date().toISOString();
      const chats = readChats(store.get("chats", [])).map((chat) => {
        if (!isPlainObject(chat)) return chat;
        const createdAt = typeof chat.createdAt === "string" ? chat.createdAt : now;
        return {
          ...chat,
          starred: chat.starred === true,
          createdAt,
          updatedAt: typeof chat.updatedAt === "string" ? chat.updatedAt : createdAt,
        };
      });
      await store.set("chats", chats);
    },
  },
  {
    version: 2,
    description: "assign ids to messages stored without one",
    up: async (store) => {
      const ids = new MonotonicIdGenerator();
      const chats = readChats(store.get("chats", [])).map((chat) => {
        if (!isPlainObject(chat) || !Array.isArray(chat.messages)) return chat;
        const messages = chat.messages.map((message: unknown): unknown => {
          if (!isPlainObject(message)) return message;
          if (typeof message.id === "string" && message.id.length > 0) return message;
          const withId: JsonObject = { ...message, id: createMessageId(ids) };
          return withId;
        });
        return { ...chat, messages };
      });
      await store.set("chats", chats);
    },
  },
];
