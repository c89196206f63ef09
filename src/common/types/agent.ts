import type { z } from "zod";
import type { AgentInputSchema, AgentSchema, AgentUpdateSchema } from "@/common/schemas/agent";

export type Agent = z.infer<typeof AgentSchema>;
export type AgentInput = z.input<typeof AgentInputSchema>;
export type AgentUpdate = z.input<typeof AgentUpdateSchema>;
