// lib/errors.ts: storage errors surfaced to callers

export class StoreError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigError extends StoreError {}

/** A table the schema wants to create is already in the catalog. */
export class SchemaConflictError extends StoreError {
    readonly table: string | null;

    constructor(table: string | null, options?: { cause?: unknown }) {
        super(table ? `Table "${table}" already exists` : "Table already exists", options);
        this.table = table;
    }
}

export type ConstraintKind = "not_null" | "unique";

export class ConstraintViolationError extends StoreError {
    readonly kind: ConstraintKind;
    readonly table: string | null;
    readonly column: string | null;
    readonly constraint: string | null;

    constructor(
        kind: ConstraintKind,
        details: { table?: string | null; column?: string | null; constraint?: string | null; message: string },
        options?: { cause?: unknown }
    ) {
        super(details.message, options);
        this.kind = kind;
        this.table = details.table ?? null;
        this.column = details.column ?? null;
        this.constraint = details.constraint ?? null;
    }
}

// SQLSTATE codes we map; everything else passes through untouched
const DUPLICATE_TABLE = "42P07";
const NOT_NULL_VIOLATION = "23502";
const UNIQUE_VIOLATION = "23505";

// A create table that loses a race trips these catalog indexes instead of 42P07
const CATALOG_NAME_INDEXES = new Set(["pg_type_typname_nsp_index", "pg_class_relname_nsp_index"]);

type DriverError = {
    code: string;
    message: string;
    table?: string;
    column?: string;
    constraint?: string;
    detail?: string;
};

function isDriverError(e: unknown): e is DriverError {
    return e instanceof Error && "code" in e && typeof e.code === "string";
}

// drizzle may wrap the driver error; walk the cause chain
function findDriverError(e: unknown): DriverError | null {
    let cur: unknown = e;
    for (let depth = 0; cur && depth < 8; depth++) {
        if (isDriverError(cur)) return cur;
        cur = cur instanceof Error ? cur.cause : undefined;
    }
    return null;
}

const pick = (v: unknown) => (typeof v === "string" && v.length ? v : null);

export function toStoreError(e: unknown): unknown {
    if (e instanceof StoreError) return e;
    const pg = findDriverError(e);
    if (!pg) return e;

    switch (pg.code) {
        case DUPLICATE_TABLE: {
            const table = pick(pg.table) ?? pg.message.match(/relation "([^"]+)" already exists/)?.[1] ?? null;
            return new SchemaConflictError(table, { cause: e });
        }
        case NOT_NULL_VIOLATION:
            return new ConstraintViolationError(
                "not_null",
                {
                    table: pick(pg.table) ?? pg.message.match(/of relation "([^"]+)"/)?.[1],
                    column: pick(pg.column) ?? pg.message.match(/in column "([^"]+)"/)?.[1],
                    message: pg.message,
                },
                { cause: e }
            );
        case UNIQUE_VIOLATION: {
            const constraint = pick(pg.constraint) ?? pg.message.match(/unique constraint "([^"]+)"/)?.[1] ?? null;
            if (constraint && CATALOG_NAME_INDEXES.has(constraint)) {
                const table = pg.detail?.match(/^Key \((?:typname|relname), \w+\)=\(([^,]+),/)?.[1] ?? null;
                return new SchemaConflictError(table, { cause: e });
            }
            return new ConstraintViolationError(
                "unique",
                { table: pick(pg.table), constraint, message: pg.message },
                { cause: e }
            );
        }
        default:
            return e;
    }
}

export async function withStoreErrors<T>(fn: () => Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (e) {
        throw toStoreError(e);
    }
}
