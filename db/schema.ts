import { pgTable, text, boolean, timestamp, integer } from "drizzle-orm/pg-core";
import { VERSION_TABLE } from "./ddl";

// One row per scraped URL; isGamblingSite stays null when unclassified or on error
export const prediction = pgTable("prediction", {
  webUrl: text("web_url").primaryKey(),
  isGamblingSite: boolean("is_gambling_site"),
  scrapingTime: timestamp("scraping_time", { withTimezone: false }).notNull(),
  isError: boolean("is_error").notNull(),
});

// Joined to prediction by web_url only; no foreign key is declared
export const errorReport = pgTable("error_report", {
  webUrl: text("web_url").primaryKey(),
  description: text("description").notNull(),
});

// contains data from manual scraping for modeling
export const dataset = pgTable("dataset", {
  webUrl: text("web_url").primaryKey(),
  scrapingTime: timestamp("scraping_time", { withTimezone: false }).notNull(),
  isGamblingSite: boolean("is_gambling_site").notNull(),
});

export const schemaVersion = pgTable(VERSION_TABLE, {
  version: integer("version").primaryKey(),
  description: text("description").notNull(),
  appliedAt: timestamp("applied_at", { withTimezone: false }).defaultNow().notNull(),
});

export type Prediction = typeof prediction.$inferSelect;
export type NewPrediction = typeof prediction.$inferInsert;
export type ErrorReport = typeof errorReport.$inferSelect;
export type NewErrorReport = typeof errorReport.$inferInsert;
export type DatasetEntry = typeof dataset.$inferSelect;
export type NewDatasetEntry = typeof dataset.$inferInsert;
