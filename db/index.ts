import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { loadDbConfig, loadEnvFiles, type DbConfig } from "../lib/env";
import * as schema from "./schema";

export function createPool(config: DbConfig) {
    return new Pool({ connectionString: config.url, ssl: config.ssl });
}

export function connect(config?: DbConfig) {
    if (!config) {
        loadEnvFiles();
        config = loadDbConfig(process.env);
    }
    console.log("[db] using host:", new URL(config.url).host);
    const pool = createPool(config);
    return { db: drizzle(pool, { schema }), pool };
}
