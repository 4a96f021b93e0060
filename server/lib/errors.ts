export class DomainError extends Error {
  readonly status: number = 400;

  constructor(message: string, readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class BadRequestError extends DomainError {}

export class NotFoundError extends DomainError {
  override readonly status = 404;
}

export class ForbiddenError extends DomainError {
  override readonly status = 403;
}

export class ConflictError extends DomainError {
  override readonly status = 409;
}

export class ServiceUnavailableError extends DomainError {
  override readonly status = 503;
}

export class InsufficientBalanceError extends DomainError {
  constructor(details: Record<string, unknown> = {}) {
    super("Insufficient balance", details);
  }
}

export class NotEnoughEnergyError extends DomainError {
  constructor(energy: number) {
    super("Not enough energy", { energy });
  }
}

export class NoActiveRoundError extends DomainError {
  constructor(message = "No active round presently") {
    super(message);
  }
}

export class DuplicateBetError extends DomainError {
  constructor() {
    super("Already placed bet for this round");
  }
}

export class AlreadyCashedOutError extends DomainError {
  constructor() {
    super("Already cashed out");
  }
}

export class RoundCrashedError extends DomainError {
  constructor() {
    super("Round crashed before cashout");
  }
}

export class PaymentGatewayError extends DomainError {
  override readonly status = 502;
}
