/**
 * Shared embedding serialization utilities.
 * Used by the vector store for SQLite BLOB storage.
 */

/**
 * Round a vector to float32 precision, matching what the store persists.
 */
export function toFloat32(embedding: ArrayLike<number>): number[] {
  return Array.from(Float32Array.from(embedding));
}

/**
 * Serialize an embedding to a Buffer for SQLite storage.
 *
 * Uses Float32Array for efficient storage (4 bytes per dimension).
 * A 384-dimension embedding uses 1.5KB of storage.
 */
export function serializeEmbedding(embedding: number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

/**
 * Deserialize an embedding from a SQLite Buffer.
 *
 * Reconstructs the Float32Array from the raw buffer bytes,
 * handling byte offset alignment properly.
 */
export function deserializeEmbedding(buffer: Buffer): number[] {
  const float32 = new Float32Array(
    buffer.buffer,
    buffer.byteOffset,
    buffer.length / Float32Array.BYTES_PER_ELEMENT,
  );
  return Array.from(float32);
}
