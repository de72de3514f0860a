export class ArchiveDirsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArchiveDirsError';
    Object.setPrototypeOf(this, ArchiveDirsError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      stack: this.stack,
    };
  }
}

export class ArchiveDirsValidationError extends ArchiveDirsError {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(message);
    this.name = 'ArchiveDirsValidationError';
    this.path = path;
    Object.setPrototypeOf(this, ArchiveDirsValidationError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      path: this.path,
    };
  }
}

export class TarNotFoundError extends ArchiveDirsError {
  readonly executable: string;

  constructor(executable: string) {
    super('tar command not found. Please ensure tar is installed and in your PATH.');
    this.name = 'TarNotFoundError';
    this.executable = executable;
    Object.setPrototypeOf(this, TarNotFoundError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      executable: this.executable,
    };
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
