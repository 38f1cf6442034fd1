import { describe, it, expect } from 'vitest';
import { PolicyApprovalDecider } from './policy-approval.js';
import { createPendingAction } from '../PendingAction.js';

const actionWithTotal = (total: number) =>
  createPendingAction({
    actionId: 'render.receipt',
    params: { fields: {}, items: [], total },
    workerType: 'receipt',
    originState: 'ReadyForAction',
    summary: 'summary',
  });

describe('PolicyApprovalDecider', () => {
  it('should approve everything without a limit', async () => {
    const decider = new PolicyApprovalDecider();
    await expect(decider.decide('s', actionWithTotal(999999))).resolves.toEqual({ kind: 'approve' });
  });

  it('should approve at the limit and cancel above it', async () => {
    const decider = new PolicyApprovalDecider({ maxTotal: 3000 });

    await expect(decider.decide('s', actionWithTotal(3000))).resolves.toEqual({ kind: 'approve' });
    await expect(decider.decide('s', actionWithTotal(3001))).resolves.toEqual({ kind: 'cancel' });
    expect(decider.decisions.map((d) => d.decision)).toEqual(['approve', 'cancel']);
  });
});
