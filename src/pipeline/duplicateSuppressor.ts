import { resizeArea, type GrayscaleFrame } from '../video/utils.js';

const HASH_WIDTH = 9;
const HASH_HEIGHT = 8;
const HASH_BITS = 64;

export type DuplicateCheck = {
  duplicate: boolean;
  fingerprint: bigint;
  distance: number | null;
  similarity: number | null;
};

/**
 * 64-bit difference hash: each bit records whether a cell of the 9x8 downsample
 * is brighter than its right-hand neighbour.
 */
export function fingerprint(frame: GrayscaleFrame): bigint {
  const small = resizeArea(frame, HASH_WIDTH, HASH_HEIGHT);
  let hash = 0n;

  for (let y = 0; y < HASH_HEIGHT; y += 1) {
    for (let x = 0; x < HASH_WIDTH - 1; x += 1) {
      const left = small.data[y * HASH_WIDTH + x];
      const right = small.data[y * HASH_WIDTH + x + 1];
      hash = (hash << 1n) | (left > right ? 1n : 0n);
    }
  }

  return hash;
}

export function hammingDistance(a: bigint, b: bigint): number {
  let diff = a ^ b;
  let count = 0;
  while (diff > 0n) {
    count += Number(diff & 1n);
    diff >>= 1n;
  }
  return count;
}

export function fingerprintSimilarity(a: bigint, b: bigint): number {
  return 1 - hammingDistance(a, b) / HASH_BITS;
}

export class DuplicateSuppressor {
  private readonly fingerprints = new Map<string, bigint>();
  private readonly similarityThreshold: number;

  constructor(similarityThreshold: number) {
    this.similarityThreshold = similarityThreshold;
  }

  /** A duplicate keeps the stored fingerprint; anything else replaces it. */
  check(cameraId: string, frame: GrayscaleFrame): DuplicateCheck {
    const current = fingerprint(frame);
    const previous = this.fingerprints.get(cameraId);

    if (previous === undefined) {
      this.fingerprints.set(cameraId, current);
      return { duplicate: false, fingerprint: current, distance: null, similarity: null };
    }

    const distance = hammingDistance(previous, current);
    const similarity = 1 - distance / HASH_BITS;
    if (similarity >= this.similarityThreshold) {
      return { duplicate: true, fingerprint: previous, distance, similarity };
    }

    this.fingerprints.set(cameraId, current);
    return { duplicate: false, fingerprint: current, distance, similarity };
  }

  isDuplicate(cameraId: string, frame: GrayscaleFrame): boolean {
    return this.check(cameraId, frame).duplicate;
  }

  forget(cameraId: string) {
    this.fingerprints.delete(cameraId);
  }
}
