import pLimit from 'p-limit';
import type { FileDescriptor } from '../descriptor/FileDescriptor.js';
import { componentLogger } from '../logger.js';
import type { Classification, ClassifierOptions, ClassifyStats, DuplicateGroup } from '../types/classify.js';
import { partitionBy, refine, withoutSingletons } from './partition.js';

export const DEFAULT_CLASSIFIER_OPTIONS: ClassifierOptions = { concurrency: 8 };

function countMembers(groups: readonly { length: number }[]): number {
  return groups.reduce((sum, group) => sum + group.length, 0);
}

/**
 * Narrows a file population to groups of identical content in three passes,
 * each looking only at the survivors of the previous one:
 *
 * 1. exact size (no I/O),
 * 2. leading bytes (a few bytes read per file),
 * 3. full-content digest (the whole file streamed).
 *
 * A read failure in pass 2 or 3 rejects the whole call: a result that
 * silently lost a file could hide real duplicates.
 */
export class DuplicateClassifier {
  private readonly log = componentLogger('classifier');

  constructor(private readonly options: ClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS) {}

  async classify(files: readonly FileDescriptor[]): Promise<Map<string, DuplicateGroup>> {
    const { groups } = await this.analyze(files);
    return groups;
  }

  async analyze(files: readonly FileDescriptor[]): Promise<Classification> {
    const limit = pLimit(this.options.concurrency);

    const bySize = withoutSingletons(partitionBy(files, (file) => file.size).values());
    const sizeCandidates = countMembers(bySize);
    this.log.debug(`size pass: ${sizeCandidates} of ${files.length} files share a size`);

    const byPrefix = await refine(bySize, (file) => file.leadingBytes(), limit);
    const prefixCandidates = countMembers(byPrefix.map((group) => group.members));
    this.log.debug(`prefix pass: ${prefixCandidates} candidates left`);

    const byContent = await refine(
      byPrefix.map((group) => group.members),
      (file) => file.contentFingerprint(),
      limit
    );

    const groups = new Map<string, DuplicateGroup>();
    let duplicates = 0;
    let reclaimableBytes = 0;
    for (const { key, members } of byContent) {
      const size = members[0].size;
      groups.set(key, { fingerprint: key, size, files: members });
      duplicates += members.length - 1;
      reclaimableBytes += size * (members.length - 1);
    }

    const stats: ClassifyStats = {
      files: files.length,
      sizeCandidates,
      prefixCandidates,
      hashed: prefixCandidates,
      groups: groups.size,
      duplicates,
      reclaimableBytes
    };
    this.log.debug(`content pass: ${stats.groups} groups, ${stats.duplicates} duplicate files`);
    return { groups, stats };
  }
}
