// db/ddl.ts: baseline tables, applied as one unit by createSchema.
// No IF NOT EXISTS: a second run fails against the catalog.

export const BASELINE_TABLES = ["prediction", "error_report", "dataset"] as const;
export type BaselineTable = (typeof BASELINE_TABLES)[number];

export const DATASET_COMMENT = "contains data from manual scraping for modeling";

export const BASELINE_STATEMENTS: readonly string[] = [
  `
    create table prediction (
      web_url text primary key,
      is_gambling_site boolean null,
      scraping_time timestamp not null,
      is_error boolean not null
    )
  `,
  `
    create table error_report (
      web_url text primary key,
      description text not null
    )
  `,
  `
    create table dataset (
      web_url text primary key,
      scraping_time timestamp not null,
      is_gambling_site boolean not null
    )
  `,
  `comment on table dataset is '${DATASET_COMMENT}'`,
];

// Version marker, outside the baseline statements and under a name of its own
export const VERSION_TABLE = "gambling_site_schema_version";
export const BASELINE_VERSION = 1;

export const VERSION_TABLE_STATEMENT = `
  create table if not exists ${VERSION_TABLE} (
    version integer primary key,
    description text not null,
    applied_at timestamp not null default now()
  )
`;
