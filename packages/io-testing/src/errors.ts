/**
 * Failures of the test double. They signal mistakes in test setup and are
 * deliberately outside the IoError hierarchy.
 */

/**
 * The contents of an {@link InMemoryFile} were reclaimed while another
 * handle still owned them.
 */
export class SharedFileError extends Error {
  readonly owners: number;

  constructor(owners: number) {
    super(`In-memory file is still shared by ${owners} owners`);
    this.name = "SharedFileError";
    this.owners = owners;
  }
}

/**
 * Written files could not be collected from a {@link FilesChannel}.
 */
export class FilesChannelError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FilesChannelError";
  }
}

/**
 * A capability the test double does not provide was called.
 */
export class NotImplementedError extends Error {
  constructor(operation: string) {
    super(`Not implemented: ${operation}`);
    this.name = "NotImplementedError";
  }
}
