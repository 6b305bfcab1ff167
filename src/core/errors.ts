/**
 * Domain errors carrying the HTTP status the web layer answers with
 */
export abstract class TrackError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class TrackNotFoundError extends TrackError {
  readonly statusCode = 404;

  constructor(public readonly trackId: string) {
    super(`Track ID ${trackId} not found`);
  }
}

export class EmptyPromptError extends TrackError {
  readonly statusCode = 400;

  constructor() {
    super('Prompt cannot be empty');
  }
}

export class TrackImmutableError extends TrackError {
  readonly statusCode = 409;

  constructor(public readonly trackId: string) {
    super(`Track ${trackId} is already completed`);
  }
}
