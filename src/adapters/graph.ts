export type ResultRow = Record<string, unknown>;

export type QueryParameters = {
  topic: string;
  difficulty: string;
};

export interface GraphAdapter {
  verifyConnectivity(): Promise<void>;
  run(cypher: string, params: QueryParameters): Promise<ResultRow[]>;
  close(): Promise<void>;
}

export type GraphSettings = {
  uri: string;
  username: string;
  password: string;
  database?: string;
  // Run verifyConnectivity() before handing the adapter out.
  verify?: boolean;
};
