import { ConflictError } from './errors';

export type RecordStatus = 'processing' | 'active' | 'error' | 'deleted';

export const RECORD_STATUSES: ReadonlyArray<RecordStatus> = ['processing', 'active', 'error', 'deleted'];

export const terminalStates: ReadonlySet<RecordStatus> = new Set(['deleted']);

const allowedTransitions: Record<RecordStatus, ReadonlyArray<RecordStatus>> = {
  processing: ['active', 'error', 'deleted'],
  active: ['deleted'],
  error: ['deleted'],
  deleted: [],
};

export function isRecordStatus(value: unknown): value is RecordStatus {
  return typeof value === 'string' && RECORD_STATUSES.some(status => status === value);
}

export class RecordStateMachine {
  canTransition(from: RecordStatus, to: RecordStatus): boolean {
    return allowedTransitions[from].includes(to);
  }

  assertTransition(recordId: string, from: RecordStatus, to: RecordStatus): void {
    if (terminalStates.has(from)) {
      throw new ConflictError(`Record ${recordId} is already ${from}`);
    }
    if (!this.canTransition(from, to)) {
      throw new ConflictError(`Invalid record status transition for ${recordId}: ${from} -> ${to}`);
    }
  }

  isTerminal(status: RecordStatus): boolean {
    return terminalStates.has(status);
  }
}

export const recordStateMachine = new RecordStateMachine();
