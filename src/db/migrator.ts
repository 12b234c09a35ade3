import mongoose, { Schema } from "mongoose";

/**
 * One versioned schema step. Versions are applied in ascending order and
 * must be unique.
 */
export interface Migration {
  version: number;
  name: string;
  up(): Promise<void>;
  down(): Promise<void>;
}

export interface AppliedMigration {
  version: number;
  name: string;
  appliedAt: Date;
}

export interface MigrationStore {
  listApplied(): Promise<AppliedMigration[]>;
  markApplied(migration: Pick<Migration, "version" | "name">): Promise<void>;
  markReverted(version: number): Promise<void>;
}

export interface MigrationStatus {
  version: number;
  name: string;
  appliedAt: Date | null;
}

const MigrationSchema = new Schema<AppliedMigration>({
  version: { type: Number, required: true, unique: true },
  name: { type: String, required: true },
  appliedAt: { type: Date, required: true },
});

export const MigrationModel = mongoose.model<AppliedMigration>(
  "Migration",
  MigrationSchema
);

export class MongoMigrationStore implements MigrationStore {
  async listApplied(): Promise<AppliedMigration[]> {
    const rows = await MigrationModel.find().sort({ version: 1 }).exec();
    return rows.map((row) => ({
      version: row.version,
      name: row.name,
      appliedAt: row.appliedAt,
    }));
  }

  async markApplied(
    migration: Pick<Migration, "version" | "name">
  ): Promise<void> {
    await MigrationModel.create({
      version: migration.version,
      name: migration.name,
      appliedAt: new Date(),
    });
  }

  async markReverted(version: number): Promise<void> {
    await MigrationModel.deleteOne({ version }).exec();
  }
}

const sortByVersion = (migrations: Migration[]): Migration[] => {
  const sorted = [...migrations].sort((a, b) => a.version - b.version);
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].version === sorted[i - 1].version) {
      throw new Error(`Duplicate migration version ${sorted[i].version}`);
    }
  }
  return sorted;
};

export class Migrator {
  constructor(
    private readonly store: MigrationStore,
    private readonly migrations: Migration[]
  ) {}

  async status(): Promise<MigrationStatus[]> {
    const applied = new Map(
      (await this.store.listApplied()).map((m) => [m.version, m.appliedAt])
    );
    return sortByVersion(this.migrations).map((m) => ({
      version: m.version,
      name: m.name,
      appliedAt: applied.get(m.version) ?? null,
    }));
  }

  /** Applies every pending migration and returns the ones that ran. */
  async migrate(): Promise<Migration[]> {
    const applied = new Set(
      (await this.store.listApplied()).map((m) => m.version)
    );
    const pending = sortByVersion(this.migrations).filter(
      (m) => !applied.has(m.version)
    );

    for (const migration of pending) {
      console.log(`[migrate] applying ${migration.version} ${migration.name}`);
      await migration.up();
      await this.store.markApplied(migration);
    }
    return pending;
  }

  /** Reverts the most recently applied migration, if any. */
  async rollback(): Promise<Migration | null> {
    const applied = await this.store.listApplied();
    if (applied.length === 0) return null;

    const latest = Math.max(...applied.map((m) => m.version));
    const migration = this.migrations.find((m) => m.version === latest);
    if (!migration) {
      throw new Error(`Applied migration ${latest} has no definition`);
    }

    console.log(`[migrate] reverting ${migration.version} ${migration.name}`);
    await migration.down();
    await this.store.markReverted(migration.version);
    return migration;
  }
}
