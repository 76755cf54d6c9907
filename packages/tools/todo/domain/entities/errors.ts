// Error types for the todo domain

export type TodoErrorCode =
  | "io_error"
  | "not_found"
  | "invalid_file"
  | "invalid_args";

export class TodoError extends Error {
  constructor(
    public readonly code: TodoErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TodoError";
  }

  toJSON(): { error: string; code: TodoErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}
