import path from 'node:path';
import type { FileDescriptor } from '../descriptor/FileDescriptor.js';
import type { DuplicateGroup } from '../types/classify.js';
import type { Comparison } from '../types/compare.js';
import { KeepPolicy, OpType, SkipReason, type Operation, type OperationPlan } from '../types/operations.js';
import { createOpId, createPlanId } from '../utils/id.js';
import { nowInstant } from '../utils/time.js';
import { destinationIsNotOlder } from './freshness.js';

function newPlan(ops: Operation[]): OperationPlan {
  return { planId: createPlanId(), createdAt: nowInstant(), ops };
}

function deleteOp(index: number, file: FileDescriptor): Operation {
  return { opId: createOpId(index), type: OpType.DELETE, src: file.path, size: file.size };
}

/** Index of the member that survives; ties on modification time go to the earlier member. */
export function survivorIndex(files: readonly FileDescriptor[], keep: KeepPolicy): number {
  if (keep === KeepPolicy.FIRST) return 0;
  let best = 0;
  for (let i = 1; i < files.length; i += 1) {
    const candidate = files[i].modificationInstant.getTime();
    const current = files[best].modificationInstant.getTime();
    if (keep === KeepPolicy.OLDEST ? candidate < current : candidate > current) best = i;
  }
  return best;
}

/** Turns classification and comparison results into operation plans. Planning never touches content. */
export class ActionPlanner {
  /** Deletes every file of tree B whose content exists in tree A. */
  planDeletion(comparison: Comparison): OperationPlan {
    return newPlan(comparison.duplicates.map((file, index) => deleteOp(index, file)));
  }

  /** Keeps one member per duplicate group and deletes the rest. */
  planGroupDeletion(groups: Iterable<DuplicateGroup>, keep: KeepPolicy = KeepPolicy.FIRST): OperationPlan {
    const ops: Operation[] = [];
    for (const group of groups) {
      const survivor = survivorIndex(group.files, keep);
      group.files.forEach((file, index) => {
        if (index !== survivor) ops.push(deleteOp(ops.length, file));
      });
    }
    return newPlan(ops);
  }

  /**
   * Copies the unique files of tree B into tree A at the same relative path.
   * A destination that already exists and is not older than the source is
   * planned as skipped.
   */
  async planPropagation(comparison: Comparison): Promise<OperationPlan> {
    const ops: Operation[] = [];
    for (const [index, file] of comparison.unique.entries()) {
      const dst = path.join(comparison.rootA, path.relative(comparison.rootB, file.path));
      const op: Operation = { opId: createOpId(index), type: OpType.COPY, src: file.path, dst, size: file.size };
      if (await destinationIsNotOlder(file.modificationInstant, dst)) {
        op.skip = SkipReason.DESTINATION_NOT_OLDER;
      }
      ops.push(op);
    }
    return newPlan(ops);
  }
}
