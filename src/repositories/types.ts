export interface UserRecord {
  id: string;
  username: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserWithCredentials extends UserRecord {
  passwordHash: string;
}

export interface NewUser {
  username: string;
  passwordHash: string;
}

export interface NoteRecord {
  id: string;
  title: string;
  body: string;
  userId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewNote {
  title: string;
  body: string;
  userId: string;
}

export interface UserRepository {
  /** Resolves to null for unknown or malformed ids. */
  findById(id: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserWithCredentials | null>;
  /** Rejects with {@link DuplicateUsernameError} when the username exists. */
  create(input: NewUser): Promise<UserRecord>;
}

export interface NoteRepository {
  /** Newest first. */
  listByOwner(userId: string): Promise<NoteRecord[]>;
  findOwned(noteId: string, userId: string): Promise<NoteRecord | null>;
  create(input: NewNote): Promise<NoteRecord>;
}

export class DuplicateUsernameError extends Error {
  constructor(public readonly username: string) {
    super(`Username "${username}" is already taken`);
    this.name = "DuplicateUsernameError";
  }
}
