import { randomUUID } from 'node:crypto';

export function createPlanId(): string {
  return `plan:${randomUUID()}`;
}

export function createOpId(index: number, width = 6): string {
  return `op:${index.toString().padStart(width, '0')}`;
}
