import mongoose, { type HydratedDocument } from "mongoose";
import User, { type IUser } from "../models/User";
import Note, { type INote } from "../models/Note";
import {
  DuplicateUsernameError,
  type NewNote,
  type NewUser,
  type NoteRecord,
  type NoteRepository,
  type UserRecord,
  type UserRepository,
  type UserWithCredentials,
} from "./types";

const DUPLICATE_KEY = 11000;

const toUserRecord = (doc: HydratedDocument<IUser>): UserRecord => ({
  id: doc._id.toString(),
  username: doc.username,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toNoteRecord = (doc: HydratedDocument<INote>): NoteRecord => ({
  id: doc._id.toString(),
  title: doc.title,
  body: doc.body,
  userId: doc.user.toString(),
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const isDuplicateKeyError = (err: unknown): boolean =>
  err instanceof mongoose.mongo.MongoServerError && err.code === DUPLICATE_KEY;

export class MongoUserRepository implements UserRepository {
  async findById(id: string): Promise<UserRecord | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const user = await User.findById(id).exec();
    return user ? toUserRecord(user) : null;
  }

  async findByUsername(username: string): Promise<UserWithCredentials | null> {
    const user = await User.findOne({ username })
      .select("+passwordHash") // Explicitly select the hash
      .exec();
    if (!user) return null;
    return { ...toUserRecord(user), passwordHash: user.passwordHash };
  }

  async create(input: NewUser): Promise<UserRecord> {
    try {
      const user = await User.create(input);
      return toUserRecord(user);
    } catch (err) {
      // The unique index catches sign-ups that raced past the lookup
      if (isDuplicateKeyError(err)) {
        throw new DuplicateUsernameError(input.username);
      }
      throw err;
    }
  }
}

export class MongoNoteRepository implements NoteRepository {
  async listByOwner(userId: string): Promise<NoteRecord[]> {
    const notes = await Note.find({ user: userId })
      .sort({ createdAt: -1, _id: -1 })
      .exec();
    return notes.map(toNoteRecord);
  }

  async findOwned(noteId: string, userId: string): Promise<NoteRecord | null> {
    if (!mongoose.isValidObjectId(noteId)) return null;
    const note = await Note.findOne({ _id: noteId, user: userId }).exec();
    return note ? toNoteRecord(note) : null;
  }

  async create(input: NewNote): Promise<NoteRecord> {
    const note = await Note.create({
      title: input.title,
      body: input.body,
      user: input.userId,
    });
    return toNoteRecord(note);
  }
}
