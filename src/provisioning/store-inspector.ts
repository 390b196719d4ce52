import { open, stat } from 'fs/promises';
import { IntegrityCheck } from '../types/index.js';

/** SIF files begin with a 32 byte launch script followed by this magic */
export const SIF_MAGIC = 'SIF_MAGIC';
export const SIF_MAGIC_OFFSET = 32;

/**
 * Decides whether an artifact in the store counts as provisioned.
 * Pulls land under a temporary name and are renamed into place, so a file
 * at the final path was always completely written.
 */
export class StoreInspector {
  constructor(private readonly integrityCheck: IntegrityCheck = 'size') {}

  async exists(path: string): Promise<boolean> {
    let size: number;
    try {
      const stats = await stat(path);
      if (!stats.isFile()) {
        return false;
      }
      size = stats.size;
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }

    switch (this.integrityCheck) {
      case 'exists':
        return true;
      case 'size':
        return size > 0;
      case 'header':
        return size >= SIF_MAGIC_OFFSET + SIF_MAGIC.length && (await this.hasSifHeader(path));
    }
  }

  private async hasSifHeader(path: string): Promise<boolean> {
    const handle = await open(path, 'r');
    try {
      const buffer = Buffer.alloc(SIF_MAGIC.length);
      const { bytesRead } = await handle.read(buffer, 0, SIF_MAGIC.length, SIF_MAGIC_OFFSET);
      return bytesRead === SIF_MAGIC.length && buffer.toString('latin1') === SIF_MAGIC;
    } finally {
      await handle.close();
    }
  }
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
