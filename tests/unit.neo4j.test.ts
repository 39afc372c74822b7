import { describe, it, expect, vi } from "vitest";
import type { GraphSettings, QueryParameters, ResultRow } from "../src/adapters/graph";
import {
  Neo4jAdapter,
  connectGraph,
  type CypherDriver,
  type CypherRecord,
  type CypherSession,
} from "../src/adapters/neo4j";
import { FakeGraph } from "./fakes";

class FakeSession implements CypherSession {
  closed = false;
  calls: Array<{ query: string; parameters: QueryParameters }> = [];

  constructor(private rows: ResultRow[], private failWith?: Error) {}

  async run(query: string, parameters: QueryParameters): Promise<{ records: CypherRecord[] }> {
    this.calls.push({ query, parameters });
    if (this.failWith) throw this.failWith;
    return { records: this.rows.map((r) => ({ toObject: () => r })) };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class FakeDriver implements CypherDriver {
  sessions: Array<{ database?: string }> = [];
  closed = 0;

  constructor(private next: FakeSession, private unreachable = false) {}

  session(config?: { database?: string }): CypherSession {
    this.sessions.push(config ?? {});
    return this.next;
  }

  async verifyConnectivity(): Promise<unknown> {
    if (this.unreachable) throw new Error("ServiceUnavailable");
    return {};
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

const params = { topic: "hallo", difficulty: "beginner" };

describe("Neo4jAdapter", () => {
  it("maps every record to a plain object and closes the session", async () => {
    const session = new FakeSession([
      { afrikaans: "hallo", english: "hello", pronunciation: "HAH-loh" },
      { afrikaans: "hallo daar", english: "hello there", pronunciation: null },
    ]);
    const driver = new FakeDriver(session);
    const rows = await new Neo4jAdapter(driver).run("MATCH (w:Word) RETURN w", params);
    expect(rows).toEqual([
      { afrikaans: "hallo", english: "hello", pronunciation: "HAH-loh" },
      { afrikaans: "hallo daar", english: "hello there", pronunciation: null },
    ]);
    expect(session.calls).toEqual([{ query: "MATCH (w:Word) RETURN w", parameters: params }]);
    expect(session.closed).toBe(true);
    expect(driver.sessions).toEqual([{}]);
  });

  it("opens sessions on the configured database", async () => {
    const driver = new FakeDriver(new FakeSession([]));
    await new Neo4jAdapter(driver, "lessons").run("RETURN 1", params);
    expect(driver.sessions).toEqual([{ database: "lessons" }]);
  });

  it("closes the session when the query fails", async () => {
    const session = new FakeSession([], new Error("SyntaxError"));
    const adapter = new Neo4jAdapter(new FakeDriver(session));
    await expect(adapter.run("MATCH", params)).rejects.toThrow("SyntaxError");
    expect(session.closed).toBe(true);
  });

  it("closes the driver only once", async () => {
    const driver = new FakeDriver(new FakeSession([]));
    const adapter = new Neo4jAdapter(driver);
    await adapter.close();
    await adapter.close();
    expect(driver.closed).toBe(1);
  });
});

describe("connectGraph", () => {
  const settings: GraphSettings = {
    uri: "neo4j://localhost:7687",
    username: "neo4j",
    password: "test-secret",
  };

  it("returns null without touching the driver when a credential is missing", async () => {
    const create = vi.fn(() => new FakeGraph());
    expect(await connectGraph({ ...settings, password: "" }, { create })).toBeNull();
    expect(await connectGraph({ uri: settings.uri }, { create })).toBeNull();
    expect(await connectGraph({}, { create })).toBeNull();
    expect(create).not.toHaveBeenCalled();
  });

  it("returns the adapter when configured", async () => {
    const graph = new FakeGraph();
    const create = vi.fn(() => graph);
    expect(await connectGraph({ ...settings, database: "lessons" }, { create })).toBe(graph);
    expect(create).toHaveBeenCalledWith({ ...settings, database: "lessons" });
  });

  it("falls back to mock mode when the driver cannot be created", async () => {
    const create = vi.fn((): FakeGraph => {
      throw new Error("Unsupported URI scheme");
    });
    expect(await connectGraph({ ...settings, uri: "ftp://nowhere" }, { create })).toBeNull();
  });

  it("falls back to mock mode and closes the driver when verification fails", async () => {
    const driver = new FakeDriver(new FakeSession([]), true);
    const create = () => new Neo4jAdapter(driver);
    expect(await connectGraph({ ...settings, verify: true }, { create })).toBeNull();
    expect(driver.closed).toBe(1);
  });

  it("keeps the adapter when verification succeeds", async () => {
    const driver = new FakeDriver(new FakeSession([]));
    const adapter = new Neo4jAdapter(driver);
    expect(await connectGraph({ ...settings, verify: true }, { create: () => adapter })).toBe(adapter);
    expect(driver.closed).toBe(0);
  });
});
