import { PGlite } from "@electric-sql/pglite";
import { sql } from "drizzle-orm";
import { drizzle, type PgliteDatabase } from "drizzle-orm/pglite";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SchemaConflictError } from "../lib/errors";
import { createSchema, describeSchema } from "./create-schema";
import { DATASET_COMMENT } from "./ddl";

describe("createSchema", () => {
  let client: PGlite;
  let db: PgliteDatabase;
  const quiet = () => {};

  beforeEach(() => {
    client = new PGlite();
    db = drizzle(client);
  });

  afterEach(async () => {
    await client.close();
  });

  it("installs the three tables, the dataset comment and the version marker", async () => {
    const log = vi.fn();
    const result = await createSchema(db, { log });

    expect(result).toEqual({ tables: ["prediction", "error_report", "dataset"], version: 1 });
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[schema] created prediction, error_report, dataset (version 1)");

    await expect(describeSchema(db)).resolves.toEqual({
      tables: { prediction: true, error_report: true, dataset: true },
      datasetComment: DATASET_COMMENT,
      version: 1,
    });
  });

  it("reports an empty store before anything is installed", async () => {
    await expect(describeSchema(db)).resolves.toEqual({
      tables: { prediction: false, error_report: false, dataset: false },
      datasetComment: null,
      version: null,
    });
  });

  it("fails the second time with SchemaConflictError and leaves the store as it was", async () => {
    await createSchema(db, { log: quiet });
    const before = await describeSchema(db);

    const err = await createSchema(db, { log: quiet }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SchemaConflictError);
    expect(err).toMatchObject({ table: "prediction" });

    await expect(describeSchema(db)).resolves.toEqual(before);
  });

  it("rolls back every table when a later one already exists", async () => {
    await db.execute(sql.raw("create table dataset (placeholder integer)"));

    const err = await createSchema(db, { log: quiet }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SchemaConflictError);
    expect(err).toMatchObject({ table: "dataset" });

    await expect(describeSchema(db)).resolves.toEqual({
      tables: { prediction: false, error_report: false, dataset: true },
      datasetComment: null,
      version: null,
    });
  });

  it("is not blocked by an unrelated schema_version table", async () => {
    await db.execute(sql.raw("create table schema_version (id serial primary key, note text)"));

    const result = await createSchema(db, { log: quiet });

    expect(result.version).toBe(1);
    await expect(describeSchema(db)).resolves.toEqual({
      tables: { prediction: true, error_report: true, dataset: true },
      datasetComment: DATASET_COMMENT,
      version: 1,
    });
  });

  it("skips the version marker when tracking is off", async () => {
    const log = vi.fn();
    const result = await createSchema(db, { trackVersion: false, log });

    expect(result.version).toBeNull();
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[schema] created prediction, error_report, dataset (untracked)");
    const status = await describeSchema(db);
    expect(status.version).toBeNull();
    expect(status.tables).toEqual({ prediction: true, error_report: true, dataset: true });
  });
});
