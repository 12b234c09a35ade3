/** An expected failure whose message is safe to show the client. */
export class AppError extends Error {
  constructor(message: string, public readonly statusCode: number) {
    super(message);
    this.name = "AppError";
  }
}
