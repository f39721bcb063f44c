export interface SubmissionKeyStore {
  lookup(requestId: string): Promise<string | undefined>;
  remember(requestId: string, operationId: string, ttlMs: number): Promise<void>;
}

type Entry = {
  operationId: string;
  expiresAt: number;
};

export class MemorySubmissionKeyStore implements SubmissionKeyStore {
  private readonly entries = new Map<string, Entry>();

  async lookup(requestId: string): Promise<string | undefined> {
    this.cleanupExpired();
    return this.entries.get(requestId)?.operationId;
  }

  async remember(requestId: string, operationId: string, ttlMs: number): Promise<void> {
    this.entries.set(requestId, {
      operationId,
      expiresAt: Date.now() + Math.max(1, ttlMs)
    });
    this.cleanupExpired();
  }

  private cleanupExpired(): void {
    const now = Date.now();
    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}
