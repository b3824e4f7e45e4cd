import { connect } from "../db";
import { describeSchema } from "../db/create-schema";

async function main() {
    const { db, pool } = connect();
    try {
        const status = await describeSchema(db);
        console.table(
            Object.entries(status.tables).map(([table, present]) => ({ table, present }))
        );
        console.log("[schema] dataset comment:", status.datasetComment ?? "none");
        console.log("[schema] version:", status.version ?? "untracked");
    } finally {
        await pool.end();
    }
}

main().catch((e) => {
    console.error(e);
    process.exit(1);
});
