/**
 * ApprovalGate Unit Tests
 *
 * - requiresApproval/run: selective interception
 * - submit: decider round trip, empty-feedback re-prompt, attempt bound
 * - resolve: single resolution
 * - events
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ApprovalGate } from './ApprovalGate.js';
import { createPendingAction } from './PendingAction.js';
import { GateProtocolViolation } from '../../utils/errors.js';
import { ScriptedDecider, createTestLogger } from '../../../tests/helpers/fakes.js';
import type { PendingAction } from '../../types/index.js';

const newAction = (actionId = 'render.receipt'): PendingAction =>
  createPendingAction({
    actionId,
    params: { fields: { storeName: 'Book Store' }, items: [], total: 1200 },
    workerType: 'receipt',
    originState: 'ReadyForAction',
    originOrdinal: 3,
    summary: 'Receipt expense claim',
  });

describe('ApprovalGate', () => {
  let decider: ScriptedDecider;
  let gate: ApprovalGate;

  beforeEach(() => {
    decider = new ScriptedDecider();
    gate = new ApprovalGate(
      { decider, sideEffecting: ['render.receipt', 'render.travel'], maxDecisionAttempts: 3 },
      createTestLogger()
    );
  });

  describe('selectivity', () => {
    it('should only intercept side-effecting ids', () => {
      expect(gate.requiresApproval('render.receipt')).toBe(true);
      expect(gate.requiresApproval('fare.lookup')).toBe(false);
    });

    it('should pass non side-effecting actions straight through', async () => {
      const execute = vi.fn(async (params: { from: string }) => `fare for ${params.from}`);

      await expect(gate.run('fare.lookup', { from: '東京' }, execute)).resolves.toBe('fare for 東京');
      expect(execute).toHaveBeenCalledTimes(1);
      expect(decider.shown).toHaveLength(0);
    });

    it('should refuse to run a side-effecting action without approval', async () => {
      const execute = vi.fn(async () => 'done');

      await expect(gate.run('render.receipt', {}, execute)).rejects.toBeInstanceOf(GateProtocolViolation);
      expect(execute).not.toHaveBeenCalled();
    });

    it('should refuse to submit an action that is not gated', async () => {
      await expect(gate.submit(newAction('fare.lookup'))).rejects.toBeInstanceOf(GateProtocolViolation);
    });
  });

  describe('submit', () => {
    it('should show the summary and resolve on approve', async () => {
      decider.push({ kind: 'approve' });
      const action = newAction();

      await expect(gate.submit(action)).resolves.toEqual({ kind: 'approve' });
      expect(decider.shown[0].summary).toBe('Receipt expense claim');
      expect(action.status).toBe('approved');
      expect(action.resolvedAt).toEqual(expect.any(Number));
    });

    it('should ask again when revise feedback is empty', async () => {
      decider.push({ kind: 'revise', feedback: '   ' }, { kind: 'revise', feedback: ' fix the date ' });
      const action = newAction();

      await expect(gate.submit(action)).resolves.toEqual({ kind: 'revise', feedback: 'fix the date' });
      expect(decider.shown).toHaveLength(2);
      expect(action.status).toBe('revised');
    });

    it('should fail after the attempt bound without resolving', async () => {
      decider.push(
        { kind: 'revise', feedback: '' },
        { kind: 'revise', feedback: '' },
        { kind: 'revise', feedback: '' }
      );
      const action = newAction();

      await expect(gate.submit(action)).rejects.toBeInstanceOf(GateProtocolViolation);
      expect(decider.shown).toHaveLength(3);
      expect(action.status).toBe('requested');
    });

    it('should record cancel as its own outcome', async () => {
      decider.push({ kind: 'cancel' });
      const action = newAction();

      await expect(gate.submit(action)).resolves.toEqual({ kind: 'cancel' });
      expect(action.status).toBe('cancelled');
    });

    it('should refuse to present an action twice', async () => {
      decider.push({ kind: 'approve' });
      const action = newAction();
      await gate.submit(action);

      await expect(gate.submit(action)).rejects.toBeInstanceOf(GateProtocolViolation);
      expect(decider.shown).toHaveLength(1);
    });
  });

  describe('resolve', () => {
    it('should accept exactly one decision', () => {
      const action = newAction();
      gate.resolve(action, { kind: 'approve' });
      const resolvedAt = action.resolvedAt;

      expect(() => gate.resolve(action, { kind: 'cancel' })).toThrow(GateProtocolViolation);
      expect(action.status).toBe('approved');
      expect(action.resolvedAt).toBe(resolvedAt);
    });

    it('should keep the params snapshot frozen', () => {
      const action = newAction();
      expect(Object.isFrozen(action.params)).toBe(true);
      expect(Object.isFrozen(action.params.fields)).toBe(true);
    });
  });

  it('should emit requested and resolved events', async () => {
    const requested = vi.fn();
    const resolved = vi.fn();
    gate.on('approval.requested', requested);
    gate.on('approval.resolved', resolved);
    decider.push({ kind: 'approve' });
    const action = newAction();

    await gate.submit(action);

    expect(requested).toHaveBeenCalledWith({
      actionId: 'render.receipt',
      pendingActionId: action.id,
      workerType: 'receipt',
    });
    expect(resolved).toHaveBeenCalledWith({
      actionId: 'render.receipt',
      pendingActionId: action.id,
      status: 'approved',
    });
  });
});
