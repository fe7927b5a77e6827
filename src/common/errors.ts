export class InputError extends Error {
  name = "InputError";
}

export class SchemaError extends Error {
  name = "SchemaError";
}

export class BuilderStateError extends Error {
  name = "BuilderStateError";
}

/**
 * An external command that failed to start or exited with a non-zero status.
 * `exitCode` is what the CLI exits with.
 */
export class CommandError extends Error {
  name = "CommandError";

  constructor(message: string, public readonly exitCode: number = 1) {
    super(message);
  }
}
