import type { z } from "zod";
import type { ChatSchema, MessageRoleSchema, MessageSchema } from "@/common/schemas/chat";

// Single source of truth: derived from the zod schemas that validate the document on read.
export type Chat = z.infer<typeof ChatSchema>;
export type Message = z.infer<typeof MessageSchema>;
export type MessageRole = z.infer<typeof MessageRoleSchema>;
