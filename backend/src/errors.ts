export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number = 500,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class CredentialParseError extends AppError {
  constructor(message: string) {
    super(message, 'CREDENTIAL_PARSE_FAILED', 500);
  }
}

export class ConnectionError extends AppError {
  constructor(message: string) {
    super(message, 'CONNECTION_FAILED', 502);
  }
}

export class FetchError extends AppError {
  constructor(
    message: string,
    public readonly providerStatus?: string | number,
  ) {
    super(message, 'FETCH_FAILED', 502);
  }
}

export class SubmissionError extends AppError {
  constructor(message: string) {
    super(message, 'SUBMISSION_FAILED', 502);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST', 400);
  }
}

export class ActionInProgressError extends AppError {
  constructor(action: string) {
    super(
      `Cannot start "${action}" while another action is still running.`,
      'ACTION_IN_PROGRESS',
      409,
    );
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  return 'Unknown error.';
}
