// db/create-schema.ts: one-shot installation of the classification tables
import { and, eq, inArray, max, sql } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { withStoreErrors } from "../lib/errors";
import {
  BASELINE_STATEMENTS,
  BASELINE_TABLES,
  BASELINE_VERSION,
  VERSION_TABLE,
  VERSION_TABLE_STATEMENT,
  type BaselineTable,
} from "./ddl";
import { infoTables, pgClass } from "./catalog";
import { schemaVersion } from "./schema";

// Any drizzle Postgres handle: node-postgres in scripts, PGlite in tests
export type Database<
  TQueryResult extends PgQueryResultHKT = PgQueryResultHKT,
  TSchema extends Record<string, unknown> = Record<string, unknown>,
> = PgDatabase<TQueryResult, TSchema>;

export type CreateSchemaOptions = {
  /** Record the baseline in the version marker table (default true). */
  trackVersion?: boolean;
  log?: (line: string) => void;
};

export type CreateSchemaResult = {
  tables: BaselineTable[];
  version: number | null;
};

/**
 * Creates prediction, error_report and dataset in a single transaction.
 * Throws SchemaConflictError if any of them exists; nothing is left behind in that case.
 */
export async function createSchema<
  TQueryResult extends PgQueryResultHKT,
  TSchema extends Record<string, unknown>,
>(
  db: Database<TQueryResult, TSchema>,
  options: CreateSchemaOptions = {}
): Promise<CreateSchemaResult> {
  const trackVersion = options.trackVersion ?? true;
  const log = options.log ?? console.log;

  await withStoreErrors(() =>
    db.transaction(async (tx) => {
      for (const statement of BASELINE_STATEMENTS) {
        await tx.execute(sql.raw(statement));
      }
      if (trackVersion) {
        await tx.execute(sql.raw(VERSION_TABLE_STATEMENT));
        await tx
          .insert(schemaVersion)
          .values({ version: BASELINE_VERSION, description: "baseline" })
          .onConflictDoNothing();
      }
    })
  );

  const version = trackVersion ? BASELINE_VERSION : null;
  log(`[schema] created ${BASELINE_TABLES.join(", ")} (${version === null ? "untracked" : `version ${version}`})`);
  return { tables: [...BASELINE_TABLES], version };
}

export type SchemaStatus = {
  tables: Record<BaselineTable, boolean>;
  datasetComment: string | null;
  version: number | null;
};

export async function describeSchema<
  TQueryResult extends PgQueryResultHKT,
  TSchema extends Record<string, unknown>,
>(db: Database<TQueryResult, TSchema>): Promise<SchemaStatus> {
  return withStoreErrors(async () => {
    const present = await db
      .select({ name: infoTables.tableName })
      .from(infoTables)
      .where(
        and(
          eq(infoTables.tableSchema, sql`current_schema()`),
          inArray(infoTables.tableName, [...BASELINE_TABLES, VERSION_TABLE])
        )
      );
    const names = new Set(present.map((r) => r.name));

    const tables = {
      prediction: names.has("prediction"),
      error_report: names.has("error_report"),
      dataset: names.has("dataset"),
    } satisfies Record<BaselineTable, boolean>;

    let datasetComment: string | null = null;
    if (tables.dataset) {
      const [row] = await db
        .select({ comment: sql<string | null>`obj_description(${pgClass.oid}, 'pg_class')` })
        .from(pgClass)
        .where(and(eq(pgClass.relname, "dataset"), sql`pg_catalog.pg_table_is_visible(${pgClass.oid})`))
        .limit(1);
      datasetComment = row?.comment ?? null;
    }

    let version: number | null = null;
    if (names.has(VERSION_TABLE)) {
      const [row] = await db.select({ version: max(schemaVersion.version) }).from(schemaVersion);
      version = row?.version ?? null;
    }

    return { tables, datasetComment, version };
  });
}
