import { RecordStateMachine, isRecordStatus } from '../stateMachine';
import { ConflictError } from '../errors';

describe('RecordStateMachine', () => {
  const machine = new RecordStateMachine();

  test('processing can move to every other status', () => {
    expect(machine.canTransition('processing', 'active')).toBe(true);
    expect(machine.canTransition('processing', 'error')).toBe(true);
    expect(machine.canTransition('processing', 'deleted')).toBe(true);
  });

  test('active and error only move to deleted', () => {
    expect(machine.canTransition('active', 'deleted')).toBe(true);
    expect(machine.canTransition('error', 'deleted')).toBe(true);
    expect(machine.canTransition('active', 'error')).toBe(false);
    expect(machine.canTransition('error', 'active')).toBe(false);
    expect(machine.canTransition('active', 'processing')).toBe(false);
  });

  test('deleted is terminal', () => {
    expect(machine.isTerminal('deleted')).toBe(true);
    expect(() => machine.assertTransition('r1', 'deleted', 'deleted')).toThrow('Record r1 is already deleted');
  });

  test('an invalid transition is a conflict', () => {
    expect(() => machine.assertTransition('r2', 'active', 'error')).toThrow(ConflictError);
  });
});

describe('isRecordStatus', () => {
  test('recognizes only the four statuses', () => {
    expect(isRecordStatus('active')).toBe(true);
    expect(isRecordStatus('archived')).toBe(false);
    expect(isRecordStatus(undefined)).toBe(false);
  });
});
