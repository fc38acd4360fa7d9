import fs from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { AccessError } from '../errors.js';
import { ErrorCode, ErrorStage } from '../types/enums.js';
import { mapFsError } from '../scanner/errorMapper.js';
import { createDigest, type HashAlgorithm } from '../utils/crypto.js';
import { Lazy } from '../utils/lazy.js';

export interface DescriptorOptions {
  prefixLength: number;
  chunkSize: number;
  hashAlgorithm: HashAlgorithm;
}

export const DEFAULT_DESCRIPTOR_OPTIONS: DescriptorOptions = {
  prefixLength: 5,
  chunkSize: 4096,
  hashAlgorithm: 'md5'
};

/**
 * One regular file as seen at scan time. Size and modification time come
 * from a single stat; content is only read when a fingerprint is asked for,
 * and each fingerprint is read at most once per instance.
 */
export class FileDescriptor {
  private readonly prefix: Lazy<string>;
  private readonly fingerprint: Lazy<string>;
  private readonly resolved: Lazy<string>;

  private constructor(
    readonly path: string,
    readonly name: string,
    readonly size: number,
    readonly modificationInstant: Date,
    private readonly options: DescriptorOptions
  ) {
    this.prefix = new Lazy(() => this.readPrefix());
    this.fingerprint = new Lazy(() => this.digestContent());
    this.resolved = new Lazy(() => this.resolveRealPath());
  }

  static async create(filePath: string, options: Partial<DescriptorOptions> = {}): Promise<FileDescriptor> {
    const absolute = path.resolve(filePath);
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(absolute);
    } catch (err) {
      throw mapFsError(err, ErrorStage.STAT, absolute);
    }
    if (!stat.isFile()) {
      throw new AccessError(absolute, ErrorCode.NOT_A_FILE, ErrorStage.STAT, `Not a regular file: ${absolute}`);
    }
    try {
      await fs.promises.access(absolute, fs.constants.R_OK);
    } catch (err) {
      throw mapFsError(err, ErrorStage.READ, absolute);
    }
    return new FileDescriptor(absolute, path.basename(absolute), stat.size, stat.mtime, {
      ...DEFAULT_DESCRIPTOR_OPTIONS,
      ...options
    });
  }

  get hasLeadingBytes(): boolean {
    return this.prefix.isSet;
  }

  get hasContentFingerprint(): boolean {
    return this.fingerprint.isSet;
  }

  /** Hex of the first `prefixLength` bytes; shorter for shorter files, '' when empty. */
  leadingBytes(): Promise<string> {
    return this.prefix.get();
  }

  /** Hex digest of the whole file. */
  contentFingerprint(): Promise<string> {
    return this.fingerprint.get();
  }

  /** The path with every symlink resolved; two descriptors of one file on disk share it. */
  realPath(): Promise<string> {
    return this.resolved.get();
  }

  private async resolveRealPath(): Promise<string> {
    try {
      return await fs.promises.realpath(this.path);
    } catch (err) {
      throw mapFsError(err, ErrorStage.STAT, this.path);
    }
  }

  private async readPrefix(): Promise<string> {
    let handle: FileHandle;
    try {
      handle = await fs.promises.open(this.path, 'r');
    } catch (err) {
      throw mapFsError(err, ErrorStage.READ, this.path);
    }
    try {
      const buffer = Buffer.alloc(this.options.prefixLength);
      let filled = 0;
      while (filled < buffer.length) {
        const { bytesRead } = await handle.read(buffer, filled, buffer.length - filled, filled);
        if (bytesRead === 0) break;
        filled += bytesRead;
      }
      return buffer.subarray(0, filled).toString('hex');
    } catch (err) {
      throw mapFsError(err, ErrorStage.READ, this.path);
    } finally {
      await handle.close();
    }
  }

  private digestContent(): Promise<string> {
    return new Promise((resolve, reject) => {
      const hash = createDigest(this.options.hashAlgorithm);
      const stream = fs.createReadStream(this.path, { highWaterMark: this.options.chunkSize });
      stream.on('data', (chunk: Buffer | string) => hash.update(chunk));
      stream.on('error', (err) => {
        stream.destroy();
        reject(mapFsError(err, ErrorStage.READ, this.path));
      });
      stream.on('end', () => resolve(hash.digest('hex')));
    });
  }
}
