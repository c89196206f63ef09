import { z } from "zod";

// --- Messages ---

export const MessageRoleSchema = z.enum(["user", "assistant"]);

export const MessageSchema = z.object({
  id: z.string().min(1),
  role: MessageRoleSchema,
  content: z.string(),
  timestamp: z.string(),
});

// --- Chats ---

export const ChatSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  messages: z.array(MessageSchema),
  starred: z.boolean().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const ChatListSchema = z.array(ChatSchema);
