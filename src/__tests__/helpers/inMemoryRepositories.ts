import {
  DuplicateUsernameError,
  type NewNote,
  type NewUser,
  type NoteRecord,
  type NoteRepository,
  type UserRecord,
  type UserRepository,
  type UserWithCredentials,
} from "../../repositories/types";

const withoutHash = ({ passwordHash: _hash, ...user }: UserWithCredentials): UserRecord => user;

export class InMemoryUserRepository implements UserRepository {
  readonly rows: UserWithCredentials[] = [];
  private nextId = 1;

  async findById(id: string): Promise<UserRecord | null> {
    const row = this.rows.find((u) => u.id === id);
    return row ? withoutHash(row) : null;
  }

  async findByUsername(username: string): Promise<UserWithCredentials | null> {
    const row = this.rows.find((u) => u.username === username);
    return row ? { ...row } : null;
  }

  async create(input: NewUser): Promise<UserRecord> {
    if (this.rows.some((u) => u.username === input.username)) {
      throw new DuplicateUsernameError(input.username);
    }
    const now = new Date();
    const row: UserWithCredentials = {
      id: `user-${this.nextId++}`,
      username: input.username,
      passwordHash: input.passwordHash,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.push(row);
    return withoutHash(row);
  }
}

export class InMemoryNoteRepository implements NoteRepository {
  readonly rows: NoteRecord[] = [];
  private nextId = 1;

  async listByOwner(userId: string): Promise<NoteRecord[]> {
    // Insertion order stands in for createdAt, which can tie within a millisecond
    return this.rows.filter((n) => n.userId === userId).reverse();
  }

  async findOwned(noteId: string, userId: string): Promise<NoteRecord | null> {
    return this.rows.find((n) => n.id === noteId && n.userId === userId) ?? null;
  }

  async create(input: NewNote): Promise<NoteRecord> {
    const now = new Date();
    const row: NoteRecord = {
      id: `note-${this.nextId++}`,
      title: input.title,
      body: input.body,
      userId: input.userId,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.push(row);
    return row;
  }
}
