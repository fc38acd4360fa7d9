import path from 'node:path';
import type { FileDescriptor } from '../descriptor/FileDescriptor.js';
import type { ClassifyStats, DuplicateGroup } from '../types/classify.js';
import type { Comparison } from '../types/compare.js';
import type { ScanError } from '../types/scanner.js';
import type { ExecutionReport, OperationPlan } from '../types/operations.js';
import { OpStatus } from '../types/operations.js';
import type { CategorySummary } from './categories.js';

const UNITS = ['KiB', 'MiB', 'GiB', 'TiB'];

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(1)} ${UNITS[unit]}`;
}

function displayPath(file: FileDescriptor, root?: string): string {
  return root ? path.relative(root, file.path) : file.path;
}

export function formatGroups(groups: Iterable<DuplicateGroup>, root?: string): string[] {
  const lines: string[] = [];
  for (const group of groups) {
    lines.push(`${group.fingerprint} (${group.files.length} x ${formatBytes(group.size)})`);
    for (const file of group.files) lines.push(`  ${displayPath(file, root)}`);
  }
  return lines;
}

export function formatStats(stats: ClassifyStats): string {
  return (
    `${stats.files} files, ${stats.groups} duplicate groups, ` +
    `${stats.duplicates} redundant copies, ${formatBytes(stats.reclaimableBytes)} reclaimable`
  );
}

export function formatScanErrors(errors: readonly ScanError[]): string[] {
  return errors.map((error) => `skipped ${error.path}: ${error.cause.code}`);
}

export function formatComparison(comparison: Comparison): string[] {
  const lines = [`duplicates in ${comparison.rootB} (${comparison.duplicates.length}):`];
  for (const file of comparison.duplicates) lines.push(`  ${displayPath(file, comparison.rootB)}`);
  lines.push(`unique in ${comparison.rootB} (${comparison.unique.length}):`);
  for (const file of comparison.unique) lines.push(`  ${displayPath(file, comparison.rootB)}`);
  return lines;
}

export function formatCategories(summaries: readonly CategorySummary[]): string[] {
  const width = Math.max(8, ...summaries.map((summary) => summary.category.length));
  return summaries.map(
    (summary) => `${summary.category.padEnd(width)}  ${String(summary.count).padStart(6)}  ${formatBytes(summary.bytes)}`
  );
}

export function formatPlan(plan: OperationPlan): string[] {
  return plan.ops.map((op) => {
    const target = op.dst ? `${op.src} -> ${op.dst}` : op.src;
    return op.skip ? `${op.type} ${target} (skip: ${op.skip})` : `${op.type} ${target}`;
  });
}

export function formatReport(report: ExecutionReport): string {
  if (!report.confirmed) return 'aborted, nothing changed';
  const count = (status: OpStatus) => report.results.filter((result) => result.status === status).length;
  return `${count(OpStatus.OK)} done, ${count(OpStatus.SKIPPED)} skipped, ${count(OpStatus.FAILED)} failed`;
}
