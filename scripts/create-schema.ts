import { connect } from "../db";
import { createSchema } from "../db/create-schema";

async function main() {
    const { db, pool } = connect();
    try {
        await createSchema(db);
        console.log("✅ Schema installed");
    } finally {
        await pool.end();
    }
}

main().catch((e) => {
    console.error(e);
    process.exit(1);
});
