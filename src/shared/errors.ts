export class AppError extends Error {
  constructor(message: string, readonly code: string = "APP_ERROR") {
    super(message);
    this.name = "AppError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class AlreadyExistsError extends AppError {
  constructor(message: string) {
    super(message, "ALREADY_EXISTS");
    this.name = "AlreadyExistsError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string) {
    super(message, "UNAUTHORIZED");
    this.name = "UnauthorizedError";
  }
}

/** Live-status lookups that failed for a transient reason (HTTP, timeout, bad body). */
export class ProbeError extends AppError {
  constructor(message: string, readonly detail?: unknown) {
    super(message, "PROBE_ERROR");
    this.name = "ProbeError";
  }
}

export class SpawnError extends AppError {
  constructor(message: string, readonly detail?: unknown) {
    super(message, "SPAWN_ERROR");
    this.name = "SpawnError";
  }
}

export class StorageUnavailableError extends AppError {
  constructor(message: string) {
    super(message, "STORAGE_UNAVAILABLE");
    this.name = "StorageUnavailableError";
  }
}

export interface ConfigIssue {
  key: string;
  message: string;
}

export class ConfigError extends AppError {
  constructor(readonly issues: ConfigIssue[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  ${issue.key}: ${issue.message}`).join("\n")}`, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}
