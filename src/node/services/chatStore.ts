import type { Result } from "@/common/types/result";
import { Ok, Err } from "@/common/types/result";
import type { ChatError, StoreError } from "@/common/types/errors";
import type { Chat, Message, MessageRole } from "@/common/types/chat";
import { ChatSchema, MessageRoleSchema } from "@/common/schemas/chat";
import type { Config } from "@/node/config";
import type { EncryptedDocumentStore } from "@/node/storage/encryptedDocumentStore";
import { openMigratedStore } from "@/node/storage/schemaMigrator";
import { CHAT_MIGRATIONS } from "@/node/storage/migrations/chatMigrations";
import { createMessageId, MonotonicIdGenerator } from "@/node/utils/ids";
import type { JsonObject } from "@/node/storage/dottedPath";
import { isPlainObject } from "@/node/storage/dottedPath";
import { log } from "@/node/services/log";

/** Lay each message over its stored record, matched by id. */
function mergeStoredMessages(stored: unknown, messages: readonly Message[]): JsonObject[] {
  const storedById = new Map<string, JsonObject>();
  if (Array.isArray(stored)) {
    for (const entry of stored) {
      if (isPlainObject(entry) && typeof entry.id === "string") {
        storedById.set(entry.id, entry);
      }
    }
  }
  return messages.map((message) => ({ ...storedById.get(message.id), ...message }));
}

export function createDefaultChatsDocument(): Record<string, unknown> {
  return { chats: [], currentChatId: null };
}

/**
 * Chat list and message history (chats.json).
 *
 * Invariants:
 * - At least one chat always exists; opening an empty document creates "Chat 1"
 *   and deleting the last chat is refused.
 * - `currentChatId` always names an existing chat.
 * - Every mutation of a chat refreshes its `updatedAt`.
 *
 * Each mutation reads the list, changes it and calls `set` before its first
 * await, so concurrent calls on the same document never drop each other's
 * writes. Methods taking an optional `chatId` default to the current chat.
 */
export class ChatStore {
  private readonly store: EncryptedDocumentStore;
  private readonly ids: MonotonicIdGenerator;
  private readonly now: () => Date;

  private constructor(store: EncryptedDocumentStore, now: () => Date) {
    this.store = store;
    this.now = now;
    this.ids = new MonotonicIdGenerator(() => now().getTime());
    this.ids.seed(this.getAllChats().map((chat) => chat.id));
  }

  static async open(
    config: Config,
    encryptionKey: string,
    options?: { now?: () => Date }
  ): Promise<Result<ChatStore, StoreError>> {
    const opened = await openMigratedStore(
      {
        name: "chats",
        filePath: config.chatsFile,
        encryptionKey,
        defaults: createDefaultChatsDocument,
      },
      CHAT_MIGRATIONS
    );
    if (!opened.success) {
      return opened;
    }

    const chatStore = new ChatStore(opened.data, options?.now ?? (() => new Date()));
    await chatStore.ensureChatsExist();
    return Ok(chatStore);
  }

  get document(): EncryptedDocumentStore {
    return this.store;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private async ensureChatsExist(): Promise<void> {
    const chats = this.getAllChats();
    if (chats.length === 0) {
      await this.createChat("Chat 1");
      return;
    }

    const currentChatId = this.store.get("currentChatId");
    if (typeof currentChatId !== "string" || !chats.some((chat) => chat.id === currentChatId)) {
      const first = chats[0];
      if (first) {
        log.warn(`[ChatStore] Current chat pointer did not resolve; switching to ${first.id}`);
        await this.store.set("currentChatId", first.id);
      }
    }
  }

  /** Raw chat records as stored, including any that fail validation. */
  private readRawChats(): unknown[] {
    const raw = this.store.get("chats", []);
    if (!Array.isArray(raw)) {
      log.warn("[ChatStore] chats is not a list; treating it as empty");
      return [];
    }
    return raw;
  }

  /**
   * All valid chats in stored order. Invalid records are skipped here and logged,
   * but mutations keep them in the document untouched.
   */
  getAllChats(): Chat[] {
    const chats: Chat[] = [];
    for (const entry of this.readRawChats()) {
      const parsed = ChatSchema.safeParse(entry);
      if (parsed.success) {
        chats.push(parsed.data);
      } else {
        log.warn("[ChatStore] Skipping invalid chat record", parsed.error.message);
      }
    }
    return chats;
  }

  getChat(chatId: string): Chat | undefined {
    return this.getAllChats().find((chat) => chat.id === chatId);
  }

  getCurrentChatId(): string {
    const value = this.store.get("currentChatId");
    if (typeof value === "string") {
      return value;
    }
    return this.getAllChats()[0]?.id ?? "";
  }

  getCurrentChat(): Chat | undefined {
    return this.getChat(this.getCurrentChatId());
  }

  /**
   * Create a chat and make it current. A missing or blank name becomes
   * "Chat N", N being the chat count after creation. Names need not be unique.
   */
  async createChat(name?: string): Promise<Chat> {
    const chats = this.getAllChats();
    const timestamp = this.timestamp();
    const chat: Chat = {
      id: this.ids.next(),
      name: name?.trim() ? name.trim() : `Chat ${chats.length + 1}`,
      messages: [],
      starred: false,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    const writes = [
      this.store.set("chats", [...this.readRawChats(), chat]),
      this.store.set("currentChatId", chat.id),
    ];
    await Promise.all(writes);
    return chat;
  }

  async switchChat(chatId: string): Promise<Chat | null> {
    const chat = this.getChat(chatId);
    if (!chat) {
      return null;
    }
    await this.store.set("currentChatId", chatId);
    return chat;
  }

  async renameChat(chatId: string, newName: string): Promise<Result<Chat, ChatError>> {
    const trimmed = newName.trim();
    if (!trimmed) {
      return Err({ type: "invalid_rename" });
    }
    return this.updateChat(chatId, (chat) => ({ ...chat, name: trimmed }));
  }

  /** Flip the star flag; a chat that was never starred becomes starred. */
  async toggleStar(chatId: string): Promise<Chat | null> {
    const result = await this.updateChat(chatId, (chat) => ({ ...chat, starred: !chat.starred }));
    return result.success ? result.data : null;
  }

  /**
   * Delete a chat. When it was current, the first remaining chat (stored order)
   * becomes current.
   */
  async deleteChat(chatId: string): Promise<Result<{ currentChatId: string }, ChatError>> {
    const chats = this.getAllChats();
    if (chats.length <= 1) {
      return Err({ type: "cannot_delete_last_chat" });
    }
    if (!chats.some((chat) => chat.id === chatId)) {
      return Err({ type: "chat_not_found", chatId });
    }

    const remaining = chats.filter((chat) => chat.id !== chatId);
    let currentChatId = this.getCurrentChatId();
    const writes = [
      this.store.set(
        "chats",
        this.readRawChats().filter((entry) => !(isPlainObject(entry) && entry.id === chatId))
      ),
    ];
    if (currentChatId === chatId) {
      const first = remaining[0];
      if (first) {
        currentChatId = first.id;
        writes.push(this.store.set("currentChatId", currentChatId));
      }
    }
    await Promise.all(writes);
    return Ok({ currentChatId });
  }

  /** Messages in insertion order; empty for an unknown chat. */
  getMessages(chatId?: string): Message[] {
    return this.getChat(chatId ?? this.getCurrentChatId())?.messages ?? [];
  }

  async addMessage(role: MessageRole, content: string, chatId?: string): Promise<Result<Message, ChatError>> {
    const parsedRole = MessageRoleSchema.safeParse(role);
    if (!parsedRole.success) {
      return Err({ type: "invalid_message_role", role: String(role) });
    }

    const message: Message = {
      id: createMessageId(this.ids),
      role: parsedRole.data,
      content,
      timestamp: this.timestamp(),
    };
    const result = await this.updateChat(chatId ?? this.getCurrentChatId(), (chat) => ({
      ...chat,
      messages: [...chat.messages, message],
    }));
    return result.success ? Ok(message) : result;
  }

  async clearMessages(chatId?: string): Promise<Result<void, ChatError>> {
    const result = await this.updateChat(chatId ?? this.getCurrentChatId(), (chat) => ({
      ...chat,
      messages: [],
    }));
    return result.success ? Ok(undefined) : result;
  }

  /**
   * Remove messages by id. Ids that match nothing are not an error; an empty id
   * list is.
   */
  async deleteMessages(messageIds: readonly string[], chatId?: string): Promise<Result<{ removed: number }, ChatError>> {
    if (messageIds.length === 0) {
      return Err({ type: "no_messages_specified" });
    }

    const toDelete = new Set(messageIds);
    let removed = 0;
    const result = await this.updateChat(chatId ?? this.getCurrentChatId(), (chat) => {
      const messages = chat.messages.filter((message) => !toDelete.has(message.id));
      removed = chat.messages.length - messages.length;
      return { ...chat, messages };
    });
    return result.success ? Ok({ removed }) : result;
  }

  private async updateChat(chatId: string, change: (chat: Chat) => Chat): Promise<Result<Chat, ChatError>> {
    const raw = this.readRawChats();
    const index = raw.findIndex((entry) => isPlainObject(entry) && entry.id === chatId);
    const entry = raw[index];
    const parsed = ChatSchema.safeParse(entry);
    if (index === -1 || !isPlainObject(entry) || !parsed.success) {
      return Err({ type: "chat_not_found", chatId: chatId || null });
    }

    const updated: Chat = { ...change(parsed.data), updatedAt: this.timestamp() };
    // Spread the stored records first so fields this build does not know survive
    raw[index] = { ...entry, ...updated, messages: mergeStoredMessages(entry.messages, updated.messages) };
    await this.store.set("chats", raw);
    return Ok(updated);
  }
}
