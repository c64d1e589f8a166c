export class UserLookupError extends Error {
  constructor(
    message: string,
    public readonly userId: string
  ) {
    super(message);
    this.name = 'UserLookupError';
  }
}

export class CardConflictError extends Error {
  constructor(
    message: string,
    public readonly card: string,
    public readonly ownerId: string
  ) {
    super(message);
    this.name = 'CardConflictError';
  }
}
