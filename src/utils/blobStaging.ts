/**
 * Object store holding media between scheduling and publishing. References
 * are URLs the protocol drivers can fetch.
 */
export interface BlobStaging {
  put(bytes: Buffer): Promise<string>;
  get(ref: string): Promise<Buffer>;
  /** Idempotent: deleting a missing reference resolves. */
  delete(ref: string): Promise<void>;
}

export class InMemoryBlobStaging implements BlobStaging {
  private readonly blobs = new Map<string, Buffer>();
  private sequence = 0;

  constructor(private readonly baseUrl = "memory://blobs") {}

  async put(bytes: Buffer): Promise<string> {
    const ref = `${this.baseUrl}/${++this.sequence}`;
    this.blobs.set(ref, Buffer.from(bytes));
    return ref;
  }

  async get(ref: string): Promise<Buffer> {
    const blob = this.blobs.get(ref);
    if (!blob) throw new Error(`Blob ${ref} not found`);
    return blob;
  }

  async delete(ref: string): Promise<void> {
    this.blobs.delete(ref);
  }

  has(ref: string): boolean {
    return this.blobs.has(ref);
  }
}
