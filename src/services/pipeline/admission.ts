/**
 * Process-wide index of documents with a run in flight. tryAcquire is a
 * single synchronous check-and-register, so two intakes for the same
 * document id can never both be admitted.
 */
export class ActiveJobRegistry {
  private readonly active = new Map<string, string>();

  tryAcquire(documentId: string, runId: string): boolean {
    if (this.active.has(documentId)) {
      return false;
    }
    this.active.set(documentId, runId);
    return true;
  }

  /** Only the run that holds the slot can free it. */
  release(documentId: string, runId: string): void {
    if (this.active.get(documentId) === runId) {
      this.active.delete(documentId);
    }
  }

  isActive(documentId: string): boolean {
    return this.active.has(documentId);
  }

  size(): number {
    return this.active.size;
  }
}

export const activeJobs = new ActiveJobRegistry();
