/**
 * The terminal could not be switched into (or out of) interactive mode.
 */
export class TerminalModeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TerminalModeError";
  }
}

export class HistoryFileNotFoundError extends Error {
  constructor(
    message: string,
    readonly path?: string
  ) {
    super(message);
    this.name = "HistoryFileNotFoundError";
  }
}

export class SettingsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SettingsError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
