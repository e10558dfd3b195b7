/**
 * Stored Image
 */
export interface StoredImage {
  key: string;
  bucket: string;
  contentType: string;
  url: string;
  expiresAt: Date;
}

/**
 * Image Storage Port (Driven Port)
 * Persists processed images under collision-free keys and hands out
 * time-limited signed URLs. All failures surface as StorageError.
 */
export interface ImageStoragePort {
  readonly backend: string;

  /**
   * Upload bytes under a generated key and return a signed retrieval URL
   */
  store(data: Buffer, suggestedName: string, contentType: string): Promise<StoredImage>;

  /**
   * Download an object by key
   */
  retrieve(key: string): Promise<Buffer>;

  /**
   * Recover the key from a signed URL issued by store()
   */
  keyFromUrl(url: string): string;

  /**
   * Verify the backend is reachable
   */
  checkReachability(): Promise<Record<string, unknown>>;
}
