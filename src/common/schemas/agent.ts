import { z } from "zod";

export const AgentSchema = z.object({
  id: z.string().min(1),
  emoji: z.string(),
  name: z.string().trim().min(1),
  description: z.string(),
});

export const AgentListSchema = z.array(AgentSchema);

/** Fields a caller may supply when creating an agent; id is always generated. */
export const AgentInputSchema = z.object({
  emoji: z.string().optional(),
  name: z.string().trim().min(1, "Agent name cannot be empty"),
  description: z.string().optional(),
});

export const AgentUpdateSchema = AgentInputSchema.partial();
