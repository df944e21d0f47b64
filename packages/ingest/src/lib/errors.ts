export class TransientNetworkError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, status: number | null = null, cause?: unknown) {
    super(message, { cause });
    this.name = "TransientNetworkError";
    this.url = url;
    this.status = status;
  }
}

export class TerminalFetchError extends Error {
  readonly url: string;
  readonly status: number;

  constructor(url: string, status: number) {
    super(`Fetch failed (${status}) for ${url}`);
    this.name = "TerminalFetchError";
    this.url = url;
    this.status = status;
  }
}

export class ParseError extends Error {
  readonly context: string;

  constructor(context: string, message: string) {
    super(`${context}: ${message}`);
    this.name = "ParseError";
    this.context = context;
  }
}

export class StructuralImportError extends Error {
  readonly filePath: string;
  readonly problems: string[];

  constructor(filePath: string, problems: string[]) {
    super(`Invalid import file ${filePath}: ${problems.join("; ")}`);
    this.name = "StructuralImportError";
    this.filePath = filePath;
    this.problems = problems;
  }
}

export type PersistenceScope = "record" | "connection";

export class PersistenceError extends Error {
  readonly scope: PersistenceScope;
  readonly table: string;

  constructor(scope: PersistenceScope, table: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "PersistenceError";
    this.scope = scope;
    this.table = table;
  }
}

export const isConnectionFailure = (error: unknown): error is PersistenceError =>
  error instanceof PersistenceError && error.scope === "connection";

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
