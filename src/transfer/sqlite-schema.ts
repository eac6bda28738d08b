export const SQLITE_SCHEMA_VERSION = 1 as const;

export const SQLITE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS records (
  provenance_id TEXT NOT NULL,
  role TEXT NOT NULL,
  excerpt TEXT NOT NULL,
  timestamp TEXT,
  thread_id TEXT NOT NULL,
  intent TEXT NOT NULL,
  primary_topic TEXT NOT NULL,
  subtopic_tags TEXT NOT NULL,
  entities TEXT NOT NULL,
  memory_candidate INTEGER NOT NULL,
  priority INTEGER NOT NULL,
  evolution_link TEXT NOT NULL,
  PRIMARY KEY (excerpt, role)
);

CREATE TABLE IF NOT EXISTS tier_entries (
  tier INTEGER NOT NULL,
  position INTEGER NOT NULL,
  primary_topic TEXT NOT NULL,
  core_belief TEXT NOT NULL,
  excerpt TEXT NOT NULL,
  provenance TEXT NOT NULL,
  priority INTEGER NOT NULL,
  role TEXT NOT NULL,
  PRIMARY KEY (tier, position)
);

CREATE TABLE IF NOT EXISTS ontology_values (
  id TEXT PRIMARY KEY,
  label TEXT NOT NULL,
  tier INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS topic_map (
  topic TEXT PRIMARY KEY,
  slug TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS value_links (
  slug TEXT NOT NULL,
  value_id TEXT NOT NULL,
  PRIMARY KEY (slug, value_id)
);

CREATE TABLE IF NOT EXISTS sources (
  type TEXT NOT NULL,
  id TEXT NOT NULL,
  label TEXT NOT NULL,
  count INTEGER NOT NULL,
  last_seen TEXT NOT NULL,
  url TEXT,
  PRIMARY KEY (type, id)
);
`;

export const SQLITE_DATA_TABLES = [
  "records",
  "tier_entries",
  "ontology_values",
  "topic_map",
  "value_links",
  "sources",
] as const;
