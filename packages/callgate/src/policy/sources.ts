import { readFile } from "node:fs/promises";
import type { PolicySource } from "../interfaces/PolicySource.js";

/** Reads a JSON policy document from disk on every read(). */
export class FilePolicySource implements PolicySource {
  constructor(readonly path: string) {}

  get description(): string {
    return this.path;
  }

  async read(): Promise<unknown> {
    const raw = await readFile(this.path, "utf-8");
    const document: unknown = JSON.parse(raw);
    return document;
  }
}

/** Serves an in-memory policy document (embedding, tests). */
export class StaticPolicySource implements PolicySource {
  readonly description = "static";

  constructor(private readonly document: unknown) {}

  async read(): Promise<unknown> {
    return this.document;
  }
}
