import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type {
  ExecuteOptions,
  ExecutionReport,
  Executor,
  Operation,
  OperationPlan,
  OpResult
} from '../types/operations.js';
import { OpStatus, OpType, SkipReason } from '../types/operations.js';
import { ErrorStage } from '../types/enums.js';
import { componentLogger } from '../logger.js';
import { mapFsError } from '../scanner/errorMapper.js';
import { nowInstant } from '../utils/time.js';
import { destinationIsNotOlder } from './freshness.js';

export class FileExecutor implements Executor {
  private readonly log = componentLogger('executor');

  async dryRun(plan: OperationPlan): Promise<OperationPlan> {
    const missingSources: string[] = [];
    const overwrites: string[] = [];
    let bytesToCopy = 0;
    let bytesToDelete = 0;

    for (const op of plan.ops) {
      if (op.skip) continue;
      if (!fs.existsSync(op.src)) {
        missingSources.push(op.src);
        continue;
      }
      if (op.type === OpType.DELETE) {
        bytesToDelete += op.size;
      } else if (op.dst) {
        bytesToCopy += op.size;
        if (fs.existsSync(op.dst)) overwrites.push(op.dst);
      }
    }

    return {
      ...plan,
      preflight: { missingSources, overwrites, bytesToCopy, bytesToDelete, opCount: plan.ops.length }
    };
  }

  /**
   * Runs the plan once `confirm` agrees. A declined plan touches nothing and
   * yields a report with `confirmed: false` and no results. A failing op is
   * recorded and the remaining ops still run.
   */
  async execute(plan: OperationPlan, options: ExecuteOptions): Promise<ExecutionReport> {
    const { sink } = options;
    const startedAt = nowInstant();
    const confirmed = await options.confirm(plan);
    if (!confirmed) {
      this.log.info(`plan ${plan.planId} declined, nothing changed`);
      const report: ExecutionReport = { planId: plan.planId, confirmed, startedAt, finishedAt: nowInstant(), results: [] };
      sink?.onFinished?.(report);
      return report;
    }

    sink?.onStarted?.(plan);
    const results: OpResult[] = [];
    for (const op of plan.ops) {
      sink?.onOpStarted?.(op);
      let result: OpResult;
      try {
        result = await this.executeOp(op);
      } catch (err) {
        const error = mapFsError(err, ErrorStage.EXECUTE, op.src);
        this.log.error(`${op.type} ${op.src} failed: ${error.message}`);
        sink?.onError?.(error);
        result = { opId: op.opId, status: OpStatus.FAILED, error };
      }
      results.push(result);
      sink?.onOpFinished?.(op, result);
    }

    const report: ExecutionReport = { planId: plan.planId, confirmed, startedAt, finishedAt: nowInstant(), results };
    sink?.onFinished?.(report);
    return report;
  }

  private async executeOp(op: Operation): Promise<OpResult> {
    if (op.skip) {
      return { opId: op.opId, status: OpStatus.SKIPPED, reason: op.skip };
    }
    if (op.type === OpType.DELETE) {
      await fs.promises.unlink(op.src);
      this.log.info(`deleted ${op.src}`);
      return { opId: op.opId, status: OpStatus.OK };
    }
    return this.executeCopy(op);
  }

  private async executeCopy(op: Operation): Promise<OpResult> {
    if (!op.dst) throw new Error(`COPY ${op.opId} has no destination`);
    const source = await fs.promises.stat(op.src);
    // The destination may have changed since planning.
    if (await destinationIsNotOlder(source.mtime, op.dst)) {
      return { opId: op.opId, status: OpStatus.SKIPPED, reason: SkipReason.DESTINATION_NOT_OLDER };
    }
    await fs.promises.mkdir(path.dirname(op.dst), { recursive: true });
    await pipeline(fs.createReadStream(op.src), fs.createWriteStream(op.dst));
    await fs.promises.utimes(op.dst, source.atime, source.mtime);
    this.log.info(`copied ${op.src} -> ${op.dst}`);
    return { opId: op.opId, status: OpStatus.OK };
  }
}
