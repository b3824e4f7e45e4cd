// Read-only views over the PostgreSQL catalog, used to inspect what createSchema left behind
import { pgSchema, text, integer } from "drizzle-orm/pg-core";

const informationSchema = pgSchema("information_schema");

export const infoTables = informationSchema.table("tables", {
  tableSchema: text("table_schema").notNull(),
  tableName: text("table_name").notNull(),
});

const pgCatalog = pgSchema("pg_catalog");

export const pgClass = pgCatalog.table("pg_class", {
  oid: integer("oid").notNull(),
  relname: text("relname").notNull(),
});
