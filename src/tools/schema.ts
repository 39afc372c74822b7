import { DEFAULT_DIFFICULTY, DIFFICULTIES, QUERY_TYPES } from "../queries/templates";
import type { ToolDescriptor } from "../types";

export const TOOL_NAME = "query_afrikaans_knowledge_graph";

export function getToolSchema(): ToolDescriptor {
  return {
    name: TOOL_NAME,
    description:
      "Query the Afrikaans knowledge graph for educational content, stories, vocabulary, and cultural information",
    inputSchema: {
      type: "object",
      properties: {
        query_type: {
          type: "string",
          enum: [...QUERY_TYPES],
          description: "Type of Afrikaans content to search for",
        },
        topic: {
          type: "string",
          description: "Specific topic or question about Afrikaans",
        },
        difficulty: {
          type: "string",
          enum: [...DIFFICULTIES],
          default: DEFAULT_DIFFICULTY,
        },
      },
      required: ["query_type", "topic"],
    },
  };
}
