import type { Difficulty } from "./queries/templates";

// Shape accepted on POST /query. Every field is optional on the wire.
export type QueryRequest = {
  query_type: string;
  topic: string;
  difficulty: Difficulty;
};

export type HealthResponse = {
  status: "healthy";
  message: string;
  database_connected: boolean;
};

export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, Record<string, unknown>>;
    required: string[];
  };
};

export type ToolsResponse = {
  tools: ToolDescriptor[];
};
