export class AppError extends Error {
  constructor(
    public message: string,
    public code: string
  ) {
    super(message);
    this.name = "AppError";
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Raised when input records or formula arguments violate their preconditions. */
export class KpiValidationError extends AppError {
  constructor(
    message: string,
    public issues: ValidationIssue[] = []
  ) {
    super(message, "VALIDATION_ERROR");
    this.name = "KpiValidationError";
  }
}

export class ErpError extends AppError {
  constructor(
    message: string,
    public status?: number
  ) {
    super(message, "ERP_ERROR");
    this.name = "ErpError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}
