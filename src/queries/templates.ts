export const QUERY_TYPES = ["vocabulary", "story", "culture", "grammar", "general"] as const;
export type QueryType = (typeof QUERY_TYPES)[number];

export const DIFFICULTIES = ["beginner", "intermediate", "advanced"] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

export const DEFAULT_QUERY_TYPE: QueryType = "general";
export const DEFAULT_DIFFICULTY: Difficulty = "beginner";

// Every template binds $topic by name; $difficulty is passed alongside but
// no template filters on it yet.
export const QUERY_TEMPLATES: Readonly<Record<QueryType, string>> = Object.freeze({
  vocabulary: `
    MATCH (w:Word {language: 'Afrikaans'})
    WHERE toLower(w.english) CONTAINS toLower($topic)
       OR toLower(w.afrikaans) CONTAINS toLower($topic)
    RETURN w.afrikaans AS afrikaans, w.english AS english, w.pronunciation AS pronunciation
    LIMIT 10
  `,
  story: `
    MATCH (s:Story)
    WHERE toLower(s.title) CONTAINS toLower($topic)
       OR toLower(s.content) CONTAINS toLower($topic)
    RETURN s.title AS title, s.content AS content, s.difficulty AS difficulty
    LIMIT 5
  `,
  culture: `
    MATCH (c:CulturalItem)
    WHERE toLower(c.name) CONTAINS toLower($topic)
       OR toLower(c.description) CONTAINS toLower($topic)
    RETURN c.name AS name, c.description AS description, c.category AS category
    LIMIT 5
  `,
  grammar: `
    MATCH (g:GrammarRule)
    WHERE toLower(g.rule) CONTAINS toLower($topic)
       OR toLower(g.explanation) CONTAINS toLower($topic)
    RETURN g.rule AS rule, g.explanation AS explanation, g.examples AS examples
    LIMIT 5
  `,
  general: `
    MATCH (n)
    WHERE toLower(n.name) CONTAINS toLower($topic)
       OR toLower(n.content) CONTAINS toLower($topic)
       OR toLower(n.description) CONTAINS toLower($topic)
    RETURN labels(n)[0] AS type, n.name AS name, n.content AS content, n.description AS description
    LIMIT 10
  `,
});

export function isQueryType(v: unknown): v is QueryType {
  return QUERY_TYPES.some((t) => t === v);
}

export function isDifficulty(v: unknown): v is Difficulty {
  return DIFFICULTIES.some((d) => d === v);
}

export function resolveQueryType(v: unknown): QueryType {
  return isQueryType(v) ? v : DEFAULT_QUERY_TYPE;
}

export function selectTemplate(queryType: string): string {
  return QUERY_TEMPLATES[resolveQueryType(queryType)];
}
