export type EscrowErrorCode =
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INVALID_AMOUNT"
  | "INVALID_DURATION"
  | "INVALID_DESCRIPTION"
  | "AMOUNT_MISMATCH"
  | "UNEXPECTED_NATIVE_VALUE"
  | "INVALID_RECIPIENT"
  | "INVALID_ADDRESS"
  | "ALREADY_COMPLETED"
  | "ALREADY_REFUNDED"
  | "DEADLINE_EXPIRED"
  | "DEADLINE_NOT_YET_PASSED"
  | "SETTLEMENT_PENDING"
  | "TRANSFER_FAILED";

export class EscrowError extends Error {
  constructor(
    readonly code: EscrowErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "EscrowError";
  }
}

export class NotFoundError extends EscrowError {
  constructor(escrowId: number) {
    super("NOT_FOUND", `Escrow ${escrowId} not found`);
  }
}

export class UnauthorizedError extends EscrowError {
  constructor(message = "Caller is not authorized for this escrow") {
    super("UNAUTHORIZED", message);
  }
}

export class TransferFailedError extends EscrowError {
  constructor(message: string, cause: unknown) {
    super("TRANSFER_FAILED", message, { cause });
  }
}

export function isEscrowError(error: unknown, code?: EscrowErrorCode): error is EscrowError {
  return error instanceof EscrowError && (code === undefined || error.code === code);
}
