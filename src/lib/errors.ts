/**
 * Errors that abort a skeleton run. Each one names the file it came from;
 * the underlying failure is kept as `cause`.
 */

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class SkeletonError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SkeletonError";
    this.filePath = filePath;
  }
}

export class SourceReadError extends SkeletonError {
  constructor(filePath: string, cause: unknown) {
    super(`Failed to read ${filePath}: ${describeCause(cause)}`, filePath, {
      cause,
    });
    this.name = "SourceReadError";
  }
}

export class SourceParseError extends SkeletonError {
  constructor(filePath: string, reason: string) {
    super(`Failed to parse ${filePath}: ${reason}`, filePath);
    this.name = "SourceParseError";
  }
}

export class GrammarLoadError extends SkeletonError {
  constructor(wasmPath: string, cause?: unknown) {
    super(
      cause === undefined
        ? `Grammar not found: ${wasmPath}`
        : `Failed to load grammar ${wasmPath}: ${describeCause(cause)}`,
      wasmPath,
      { cause },
    );
    this.name = "GrammarLoadError";
  }
}
