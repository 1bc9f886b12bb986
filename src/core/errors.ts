export type ErrorCode =
  | "VALIDATION_ERROR"
  | "TODO_NOT_FOUND"
  | "CORRUPT_STORE"
  | "PERSISTENCE_ERROR"
  | "ID_SPACE_EXHAUSTED";

export class AppError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
  }
}

export class TodoNotFoundError extends AppError {
  constructor(readonly id: number) {
    super("TODO_NOT_FOUND", `Todo ${id} not found`);
  }
}

/** Backing file exists but cannot be turned into a todo collection. */
export class CorruptStoreError extends AppError {
  constructor(readonly path: string, reason: string, cause?: unknown) {
    super("CORRUPT_STORE", `Cannot load ${path}: ${reason}`, { cause });
  }
}

export class PersistenceError extends AppError {
  constructor(readonly path: string, cause: unknown) {
    super("PERSISTENCE_ERROR", `Failed to write ${path}`, { cause });
  }
}

/** The next id would no longer be a safe integer, so it could not be loaded back. */
export class IdSpaceExhaustedError extends AppError {
  constructor(readonly lastId: number) {
    super("ID_SPACE_EXHAUSTED", `No todo id left after ${lastId}`);
  }
}
