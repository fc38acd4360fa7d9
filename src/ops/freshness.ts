import fs from 'node:fs';
import { mapFsError } from '../scanner/errorMapper.js';
import { ErrorStage } from '../types/enums.js';
import { isSameOrLater } from '../utils/time.js';

/**
 * A copy onto an existing file only goes ahead when the source is strictly
 * newer; equal modification times count as "not older" and block it.
 */
export async function destinationIsNotOlder(sourceMtime: Date, destination: string): Promise<boolean> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(destination);
  } catch (err) {
    const mapped = mapFsError(err, ErrorStage.STAT, destination);
    if (mapped.osCode === 'ENOENT') return false;
    throw mapped;
  }
  return isSameOrLater(stat.mtime, sourceMtime);
}
