export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export interface PeerFailure {
  peer: string;
  error: unknown;
}

export class PeerUnavailableError extends Error {
  constructor(
    message: string,
    public readonly failures: PeerFailure[]
  ) {
    super(message);
    this.name = 'PeerUnavailableError';
  }

  get peers(): string[] {
    return this.failures.map((failure) => failure.peer);
  }
}
