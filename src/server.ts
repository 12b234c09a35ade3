import http from "node:http";
import config from "./config";
import { createApp } from "./app";
import { connectToDatabase, disconnectFromDatabase } from "./db/mongoose";
import {
  MongoNoteRepository,
  MongoUserRepository,
} from "./repositories/mongoRepositories";

async function main() {
  await connectToDatabase(config.mongoURI);

  const app = createApp({
    config,
    users: new MongoUserRepository(),
    notes: new MongoNoteRepository(),
  });

  const server = http.createServer(app);
  server.listen(config.port, () => {
    console.log(`[server] listening on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] received ${signal}, shutting down...`);
    server.close(() => {
      disconnectFromDatabase()
        .then(() => {
          console.log("[server] closed");
          process.exit(0);
        })
        .catch((err) => {
          console.error("[server] failed to disconnect cleanly:", err);
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("[server] failed to start:", err);
  process.exit(1);
});
