import config from "../config";
import { connectToDatabase, disconnectFromDatabase } from "../db/mongoose";
import { Migrator, MongoMigrationStore } from "../db/migrator";
import { migrations } from "../db/migrations";

const USAGE = "Usage: migrate [up|down|status]";

async function main() {
  const command = process.argv[2] ?? "up";
  if (!["up", "down", "status"].includes(command)) {
    console.error(USAGE);
    process.exit(1);
  }

  await connectToDatabase(config.mongoURI);
  const migrator = new Migrator(new MongoMigrationStore(), migrations);

  try {
    if (command === "up") {
      const ran = await migrator.migrate();
      console.log(
        ran.length > 0
          ? `[migrate] applied ${ran.length} migration(s)`
          : "[migrate] database is up to date"
      );
    } else if (command === "down") {
      const reverted = await migrator.rollback();
      console.log(
        reverted
          ? `[migrate] reverted ${reverted.version} ${reverted.name}`
          : "[migrate] nothing to revert"
      );
    } else {
      for (const entry of await migrator.status()) {
        const state = entry.appliedAt
          ? `applied ${entry.appliedAt.toISOString()}`
          : "pending";
        console.log(`${entry.version}\t${entry.name}\t${state}`);
      }
    }
  } finally {
    await disconnectFromDatabase();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
