/**
 * Raised while loading or validating startup configuration. The process
 * must not start when one of these escapes bootstrap.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** A download directory that is missing or not writable. */
export class InvalidDirectoryError extends Error {
  readonly directory: string;

  constructor(directory: string, options?: { cause?: unknown }) {
    super(
      `Directory ${directory} does not exist or is not writable`,
      options,
    );
    this.name = "InvalidDirectoryError";
    this.directory = directory;
  }
}

/** Rejected to pending and future consumers once a queue is closed and empty. */
export class QueueClosedError extends Error {
  constructor() {
    super("Queue is closed");
    this.name = "QueueClosedError";
  }
}

export class NotificationParseError extends Error {
  readonly topic: string;

  constructor(topic: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NotificationParseError";
    this.topic = topic;
  }
}

export class DownloadError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Error downloading ${url}: ${reason}`, { cause });
    this.name = "DownloadError";
    this.url = url;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
