import type { DocumentDescriptor, DocumentRecord, IngestionStatus } from "./types";

/**
 * Tracks every document ever referenced, its ingestion status and the generation it was last
 * indexed into. Ids are unique; registering a known id is idempotent and returns the existing
 * record unchanged.
 *
 * Lifecycle: unindexed -> indexing -> indexed | failed. Indexed and failed documents may go
 * back to indexing (re-index or retry). Every mutation is synchronous, so a caller never observes
 * a half-applied transition.
 */
export class DocumentRegistry {
  private readonly records = new Map<string, DocumentRecord>();

  /** Register a document, or return the existing record for its id. */
  public register(doc: DocumentDescriptor): DocumentRecord {
    const existing = this.records.get(doc.id);
    if (existing) return existing;
    const record: DocumentRecord = {
      id: doc.id,
      source: doc.source,
      location: doc.location,
      format: doc.format,
      byteLength: 0,
      status: "unindexed",
    };
    this.records.set(doc.id, record);
    return record;
  }

  public get(documentId: string): DocumentRecord | undefined {
    return this.records.get(documentId);
  }

  /** Current ingestion status, or undefined for an unknown id. */
  public status(documentId: string): IngestionStatus | undefined {
    return this.records.get(documentId)?.status;
  }

  /** unindexed | indexed | failed -> indexing */
  public markIndexing(documentId: string): DocumentRecord {
    const record = this.require(documentId);
    if (record.status === "indexing") {
      throw new Error(`Document ${documentId} is already being indexed`);
    }
    return this.update({ ...record, status: "indexing", error: undefined });
  }

  /** Record the raw byte length once the document's bytes were loaded. */
  public setByteLength(documentId: string, byteLength: number): DocumentRecord {
    return this.update({ ...this.require(documentId), byteLength });
  }

  /**
   * indexing -> indexed, recording the generation the document now belongs to. An indexed
   * document carried over into a newer generation is re-pointed at it.
   */
  public markIndexed(documentId: string, generationId: number): DocumentRecord {
    const record = this.require(documentId);
    if (record.status !== "indexing" && record.status !== "indexed") {
      throw new Error(`Cannot mark ${documentId} indexed from status '${record.status}'`);
    }
    return this.update({ ...record, status: "indexed", generationId, error: undefined });
  }

  /** indexing -> failed. The document stays registered and can be retried. */
  public markFailed(documentId: string, error: string): DocumentRecord {
    const record = this.require(documentId);
    if (record.status !== "indexing") {
      throw new Error(`Cannot mark ${documentId} failed from status '${record.status}'`);
    }
    return this.update({ ...record, status: "failed", error });
  }

  /** Put back a record captured before a build that was discarded. */
  public restore(record: DocumentRecord): void {
    this.records.set(record.id, record);
  }

  /** All records (optionally only those with a given status), sorted by id. */
  public list(filterByStatus?: IngestionStatus): DocumentRecord[] {
    const out: DocumentRecord[] = [];
    for (const record of this.records.values()) {
      if (!filterByStatus || record.status === filterByStatus) out.push(record);
    }
    return out.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  public get size(): number {
    return this.records.size;
  }

  private require(documentId: string): DocumentRecord {
    const record = this.records.get(documentId);
    if (!record) throw new Error(`Unknown document: ${documentId}`);
    return record;
  }

  private update(record: DocumentRecord): DocumentRecord {
    this.records.set(record.id, record);
    return record;
  }
}
