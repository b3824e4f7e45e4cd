// lib/env.ts: database connection settings
import path from "node:path";
import { config } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";

export type DbConfig = {
    url: string;
    ssl: { rejectUnauthorized: boolean } | undefined;
};

const PostgresUrl = z
    .string()
    .url()
    .refine((u) => /^postgres(ql)?:\/\//i.test(u), { message: "expected a postgres:// connection string" });

/** Loads .env.local first, then .env; variables already set win. */
export function loadEnvFiles(cwd = process.cwd()) {
    config({ path: path.resolve(cwd, ".env.local") });
    config({ path: path.resolve(cwd, ".env") });
}

export function loadDbConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
    const raw = env.DATABASE_URL || env.DRIZZLE_DATABASE_URL || env.DIRECT_URL;
    if (!raw) {
        throw new ConfigError("Missing DATABASE_URL / DRIZZLE_DATABASE_URL / DIRECT_URL");
    }

    const parsed = PostgresUrl.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid database URL: ${parsed.error.issues[0]?.message ?? "unparseable"}`);
    }
    const url = parsed.data;

    // Supabase/pooler certs are self-signed; same when sslmode is forced in the URL
    const needsSSL =
        /supabase\.co|pooler\.supabase\.com/i.test(url) ||
        /sslmode=(require|no-verify)/i.test(url);

    return { url, ssl: needsSSL ? { rejectUnauthorized: false } : undefined };
}
