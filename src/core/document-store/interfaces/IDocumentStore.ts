/**
 * Document Store Interfaces
 *
 * The blob store persists named byte blobs. The document store sits on top
 * of it, keeps one canonical document per entity, and reports whether a
 * write changed the stored content.
 */

import type { JsonValue } from "../models/canonical.js";

/**
 * Named blob persistence. Names are flat file names, never paths.
 */
export interface IBlobStore {
  /** Location description used in logs and errors */
  readonly location: string;

  /** Blob content, or null when no blob with that name exists */
  read(name: string): Promise<Buffer | null>;

  /** Replace the blob atomically */
  write(name: string, data: Buffer): Promise<void>;

  /** Names of all stored blobs, sorted */
  list(): Promise<string[]>;
}

/**
 * Outcome of one document write
 */
export interface DocumentWriteResult {
  /** Canonical content differs from what was stored (true for new documents) */
  changed: boolean;
  /** No prior blob existed */
  isNew: boolean;
  /** Blob name the document was written to */
  name: string;
  /** SHA-256 of the canonical bytes, for history entries */
  contentHash: string;
}

export interface IDocumentStore {
  /**
   * Canonicalize and persist a document, overwriting unconditionally.
   *
   * @throws {StoreWriteError} when the blob cannot be written
   */
  write(entityId: string, document: unknown): Promise<DocumentWriteResult>;

  /** Stored canonical document, or null */
  read(entityId: string): Promise<JsonValue | null>;

  has(entityId: string): Promise<boolean>;

  /** Ids of every stored document, sorted */
  list(): Promise<string[]>;

  /** Blob name for an entity id */
  nameFor(entityId: string): string;
}
