import type { GraphAdapter, QueryParameters, ResultRow } from "../adapters/graph";
import { logger as rootLogger, type Logger } from "../utils/logger";

export type QueryOutcome =
  | { ok: true; rows: ResultRow[] }
  | { ok: false; rows: []; error: Error };

export const NOT_CONNECTED_MESSAGE = "Neo4j not connected";

/**
 * Runs query templates against the shared graph connection.
 *
 * Query failures are logged and come back as an empty row list, so a caller
 * of `execute` sees the same thing for "no matches" and "query failed".
 * `run` keeps the two apart.
 */
export class QueryExecutor {
  constructor(private graph: GraphAdapter | null, private log: Logger = rootLogger) {}

  get connected(): boolean {
    return this.graph !== null;
  }

  async run(cypher: string, params: QueryParameters, queryType: string): Promise<QueryOutcome> {
    if (!this.graph) {
      return { ok: true, rows: [{ message: NOT_CONNECTED_MESSAGE, topic: params.topic, query_type: queryType }] };
    }
    try {
      const rows = await this.graph.run(cypher, params);
      return { ok: true, rows };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.error("graph_query_failed", { queryType, topic: params.topic, err: error });
      return { ok: false, rows: [], error };
    }
  }

  async execute(cypher: string, params: QueryParameters, queryType: string): Promise<ResultRow[]> {
    const outcome = await this.run(cypher, params, queryType);
    return outcome.rows;
  }
}
