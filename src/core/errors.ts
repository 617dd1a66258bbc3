export class PersistenceError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "PersistenceError";
  }
}

export class ScreenError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "ScreenError";
  }
}

export class RecoveryError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "RecoveryError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
