export type AppErrorCode = "VALIDATION_ERROR" | "NOT_FOUND";

export class AppError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: AppErrorCode
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "VALIDATION_ERROR");
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Todo not found") {
    super(message, 404, "NOT_FOUND");
  }
}
