/**
 * Where a PolicyStore reads its policy document from. read() may throw or reject;
 * the store absorbs the failure and falls back to the built-in policy.
 */
export interface PolicySource {
  /** Short label for logs (e.g. the file path). */
  readonly description: string;

  /** Return the raw, unvalidated policy document. */
  read(): Promise<unknown>;
}
