import type { Agent } from "@/common/types/agent";

/** Id of the built-in persona; always a valid current-agent pointer. */
export const DEFAULT_AGENT_ID = "default";

/** Emoji given to agents created or migrated without one. */
export const DEFAULT_AGENT_EMOJI = "🤖";

/**
 * Persona used when the current-agent pointer does not resolve (never set, or
 * the agent was deleted). Not stored; resolved at read time.
 */
export const DEFAULT_PERSONA: Agent = {
  id: DEFAULT_AGENT_ID,
  emoji: DEFAULT_AGENT_EMOJI,
  name: "Assistant",
  description: "General-purpose coding assistant.",
};

/** Seeded into an empty agent list the first time it is read. */
export const BUILT_IN_AGENTS: readonly Agent[] = [
  {
    id: "default-python",
    emoji: "🐍",
    name: "Python Expert",
    description:
      "**Python specialist** focusing on:\n- Data science and machine learning\n- Backend development with Django/Flask\n- Automation and scripting\n- Testing and debugging",
  },
  {
    id: "default-frontend",
    emoji: "⚛️",
    name: "Frontend Developer",
    description:
      "**Frontend specialist** focusing on:\n- React, Vue, and modern JavaScript\n- TypeScript and type-safe development\n- Responsive design and CSS\n- Performance optimization",
  },
  {
    id: "default-devops",
    emoji: "🔧",
    name: "DevOps Engineer",
    description:
      "**DevOps specialist** focusing on:\n- Docker and Kubernetes\n- CI/CD pipelines\n- AWS, Azure, and cloud infrastructure\n- Monitoring and observability",
  },
];
