import jwt from "jsonwebtoken";
import Joi from "joi";

export type FlashCategory = "success" | "error" | "info";

export interface FlashMessage {
  category: FlashCategory;
  message: string;
}

export interface SessionData {
  userId?: string;
  flashes: FlashMessage[];
}

const sessionSchema = Joi.object<SessionData>({
  userId: Joi.string(),
  flashes: Joi.array()
    .items(
      Joi.object<FlashMessage>({
        category: Joi.string().valid("success", "error", "info").required(),
        message: Joi.string().required(),
      })
    )
    .default([]),
});

/**
 * Client-held session state. Mutations mark it modified so the cookie is
 * only rewritten when something changed.
 */
export class Session {
  private data: SessionData;
  private modified = false;

  constructor(data: SessionData = { flashes: [] }) {
    this.data = { userId: data.userId, flashes: [...data.flashes] };
  }

  get userId(): string | undefined {
    return this.data.userId;
  }

  get isModified(): boolean {
    return this.modified;
  }

  get isEmpty(): boolean {
    return this.data.userId === undefined && this.data.flashes.length === 0;
  }

  /** Drops all prior state and remembers the given user. */
  logIn(userId: string): void {
    this.clear();
    this.data.userId = userId;
  }

  clear(): void {
    this.data = { flashes: [] };
    this.modified = true;
  }

  /** Queues a message; one already pending with the same text is not repeated. */
  flash(category: FlashCategory, message: string): void {
    const pending = this.data.flashes.some(
      (f) => f.category === category && f.message === message
    );
    if (pending) return;
    this.data.flashes.push({ category, message });
    this.modified = true;
  }

  /** Returns pending flashes and forgets them. */
  consumeFlashes(): FlashMessage[] {
    const flashes = this.data.flashes;
    if (flashes.length > 0) {
      this.data.flashes = [];
      this.modified = true;
    }
    return flashes;
  }

  toJSON(): SessionData {
    return this.data.userId === undefined
      ? { flashes: this.data.flashes }
      : { userId: this.data.userId, flashes: this.data.flashes };
  }
}

export const encodeSession = (
  session: Session,
  secret: string,
  maxAgeDays: number
): string =>
  jwt.sign(session.toJSON(), secret, {
    expiresIn: maxAgeDays * 24 * 60 * 60,
  });

/**
 * Any token that fails verification or has an unexpected shape decodes to an
 * empty session.
 */
export const decodeSession = (
  token: string | undefined,
  secret: string
): Session => {
  if (!token) return new Session();

  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, secret);
  } catch {
    return new Session();
  }

  const { error, value } = sessionSchema.validate(payload, {
    stripUnknown: true,
  });
  if (error) return new Session();
  return new Session(value);
};
