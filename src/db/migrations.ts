import User from "../models/User";
import Note from "../models/Note";
import type { Migration } from "./migrator";

export const migrations: Migration[] = [
  {
    version: 1,
    name: "create-users",
    async up() {
      await User.createCollection();
      // Unique index on username, declared in the schema
      await User.createIndexes();
    },
    async down() {
      await User.collection.drop();
    },
  },
  {
    version: 2,
    name: "create-notes",
    async up() {
      await Note.createCollection();
      await Note.createIndexes();
    },
    async down() {
      await Note.collection.drop();
    },
  },
];
