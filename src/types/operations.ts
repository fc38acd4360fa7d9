import type { AccessError } from '../errors.js';

export enum OpType {
  COPY = 'COPY',
  DELETE = 'DELETE'
}

export enum SkipReason {
  /** The destination exists and was modified at the same instant as the source or later. */
  DESTINATION_NOT_OLDER = 'DESTINATION_NOT_OLDER'
}

/** Which member of a duplicate group survives a group deletion. */
export enum KeepPolicy {
  FIRST = 'FIRST',
  OLDEST = 'OLDEST',
  NEWEST = 'NEWEST'
}

export interface Operation {
  opId: string;
  type: OpType;
  /** Absolute path of the file copied or deleted. */
  src: string;
  /** Absolute destination path; COPY only. */
  dst?: string;
  size: number;
  /** Set when planning already knows the op must not run. */
  skip?: SkipReason;
}

export interface Preflight {
  missingSources: string[];
  /** Destinations that exist and would be replaced. */
  overwrites: string[];
  bytesToCopy: number;
  bytesToDelete: number;
  opCount: number;
}

export interface OperationPlan {
  planId: string;
  createdAt: string;
  ops: Operation[];
  preflight?: Preflight;
}

export enum OpStatus {
  OK = 'OK',
  SKIPPED = 'SKIPPED',
  FAILED = 'FAILED'
}

export interface OpResult {
  opId: string;
  status: OpStatus;
  reason?: SkipReason;
  error?: AccessError;
}

export interface ExecutionReport {
  planId: string;
  confirmed: boolean;
  startedAt: string;
  finishedAt: string;
  results: OpResult[];
}

export interface ExecutionSink {
  onStarted(plan: OperationPlan): void;
  onOpStarted(op: Operation): void;
  onOpFinished(op: Operation, result: OpResult): void;
  onError(err: AccessError): void;
  onFinished(report: ExecutionReport): void;
}

/** Gate in front of every destructive run; the engine itself never prompts. */
export type ConfirmFn = (plan: OperationPlan) => boolean | Promise<boolean>;

export interface ExecuteOptions {
  confirm: ConfirmFn;
  sink?: Partial<ExecutionSink>;
}

export interface Executor {
  dryRun(plan: OperationPlan): Promise<OperationPlan>;
  execute(plan: OperationPlan, options: ExecuteOptions): Promise<ExecutionReport>;
}
