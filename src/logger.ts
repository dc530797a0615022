export interface Logger {
  warn(message: string): void;
  error(message: string): void;
}

export function createStderrLogger(
  stream: NodeJS.WritableStream = process.stderr,
): Logger {
  return {
    warn: (message) => {
      stream.write(`[WARNING] ${message}\n`);
    },
    error: (message) => {
      stream.write(`[ERROR] ${message}\n`);
    },
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
