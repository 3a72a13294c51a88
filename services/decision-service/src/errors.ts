export class DecisionServiceError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = "DecisionServiceError";
  }
}

export class DecisionValidationError extends DecisionServiceError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 400);
    this.name = "DecisionValidationError";
  }
}

export class ReviewGateError extends DecisionServiceError {
  constructor(message: string) {
    super(message, 400);
    this.name = "ReviewGateError";
  }
}

export class DecisionNotFoundError extends DecisionServiceError {
  constructor(public readonly threadId: string) {
    super(`Decision ${threadId} not found`, 404);
    this.name = "DecisionNotFoundError";
  }
}

export class DecisionAlreadyResolvedError extends DecisionServiceError {
  constructor(public readonly threadId: string) {
    super(`Decision ${threadId} has already been resolved`, 409);
    this.name = "DecisionAlreadyResolvedError";
  }
}

export class InvalidTransitionError extends DecisionServiceError {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Illegal decision status transition ${from} -> ${to}`, 500);
    this.name = "InvalidTransitionError";
  }
}

export class ExtractionUnavailableError extends DecisionServiceError {
  constructor() {
    super("Decision extraction requires a configured chat model", 503);
    this.name = "ExtractionUnavailableError";
  }
}

export class LlmConfigurationError extends DecisionServiceError {
  constructor(message: string) {
    super(message, 500);
    this.name = "LlmConfigurationError";
  }
}

export class RetryExhaustedError extends DecisionServiceError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(`${operation} failed after ${attempts} attempts`, 502);
    this.name = "RetryExhaustedError";
  }
}

export class StoreUnavailableError extends DecisionServiceError {
  constructor(
    public readonly operation: string,
    public readonly failure: unknown
  ) {
    super(`Decision storage is unavailable (${operation})`, 503);
    this.name = "StoreUnavailableError";
  }
}
