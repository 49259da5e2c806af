/**
 * Domain errors for engagement (votes, comments).
 */
export class InvalidCommentTextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCommentTextError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidVoteKindError extends Error {
  constructor(value: string) {
    super(`Vote type must be 'up' or 'down', got '${value}'`);
    this.name = 'InvalidVoteKindError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
