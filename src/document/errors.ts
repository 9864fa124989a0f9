/**
 * Decode-time errors. Both are fatal: a document that raises either is
 * never partially applied.
 */

/**
 * Unrecognized schema version, missing required key, or (in strict mode)
 * an unrecognized top-level key.
 */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

/**
 * Individual shape problem found while decoding.
 */
export interface DocumentIssue {
  /** Dotted path to the offending value, "(root)" for the document itself */
  path: string;
  /** Human-readable error message */
  message: string;
}

/**
 * A value has the wrong shape: non-integer offset, negative address,
 * non-string name and the like.
 */
export class MalformedDataError extends Error {
  public readonly issues: DocumentIssue[];

  constructor(message: string, issues: DocumentIssue[]) {
    super(message);
    this.name = "MalformedDataError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Reading or writing a document file failed.
 */
export class DocumentIoError extends Error {
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = "DocumentIoError";
    this.path = path;
  }
}
