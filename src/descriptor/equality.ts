import type { FileDescriptor } from './FileDescriptor.js';

/** Set-membership key derived from size and content fingerprint only. */
export async function contentKey(file: FileDescriptor): Promise<string> {
  return `${file.size}:${await file.contentFingerprint()}`;
}

/** Files are equal when their sizes and content fingerprints match; paths and names never count. */
export async function contentEquals(a: FileDescriptor, b: FileDescriptor): Promise<boolean> {
  if (a.size !== b.size) return false;
  const [left, right] = await Promise.all([a.contentFingerprint(), b.contentFingerprint()]);
  return left === right;
}

export class ContentKeySet {
  private readonly keys = new Set<string>();

  get size(): number {
    return this.keys.size;
  }

  async add(file: FileDescriptor): Promise<void> {
    this.keys.add(await contentKey(file));
  }

  async has(file: FileDescriptor): Promise<boolean> {
    return this.keys.has(await contentKey(file));
  }
}
