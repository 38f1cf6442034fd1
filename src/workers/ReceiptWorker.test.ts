/**
 * ReceiptWorker Tests
 *
 * Tests for:
 * - Field validation feedback
 * - Cancel as a neutral outcome
 * - Render failure and retry with a fresh pending action
 * - Supervisor approval above the threshold
 */

import { describe, it, expect } from 'vitest';
import { ContextBag } from '../context/ContextBag.js';
import { createHarness, reply } from '../../tests/helpers/fakes.js';
import { ReceiptWorker } from './ReceiptWorker.js';

const context = ContextBag.from({ requesterId: 'test-user' });

const receipt = {
  storeName: 'Book Store',
  amount: 3200,
  date: '2026-10-10',
  items: ['notebook', 'pens'],
  expenseCategory: 'office supplies',
  purpose: 'team supplies',
};

describe('ReceiptWorker', () => {
  it('reports each invalid field and keeps the valid ones', async () => {
    const h = createHarness();
    const worker = new ReceiptWorker(h.deps);
    h.completion.push(
      reply('Recorded.', { type: 'collect', fields: { amount: 50000, date: '2026-11-01', storeName: 'Book Store' } })
    );

    const outcome = await worker.advance('Book Store, 50000 yen, November 1st', context);

    expect(outcome.kind).toBe('reply');
    expect(outcome.text).toBe(
      'Some values could not be accepted:\n' +
        'amount: Amounts over ¥30,000 cannot be claimed\n' +
        'date: The date cannot be in the future'
    );
    expect(worker.getState().state).toBe('CollectingFields');
    expect(worker.getState().fields).toEqual({ storeName: 'Book Store' });
    expect(worker.getState().lastErrors).toEqual([
      { field: 'amount', message: 'Amounts over ¥30,000 cannot be claimed' },
      { field: 'date', message: 'The date cannot be in the future' },
    ]);
  });

  it('rejects item updates on a single-item claim', async () => {
    const h = createHarness();
    const worker = new ReceiptWorker(h.deps);
    h.completion.push(reply('Ok.', { type: 'collect', items: [{ fields: { amount: 100 } }] }));

    const outcome = await worker.advance('100 yen', context);

    expect(outcome.text).toBe('Some values could not be accepted:\nitems: This claim has no item list');
  });

  it('cancels without rendering and starts over on the next input', async () => {
    const h = createHarness();
    const worker = new ReceiptWorker(h.deps);
    h.completion.push(
      reply('Thanks.', { type: 'collect', fields: receipt }),
      reply('Which store?', { type: 'collect', fields: { storeName: 'Cafe' } })
    );
    h.decider.push({ kind: 'cancel' });

    const outcome = await worker.advance('Receipt from Book Store', context);

    expect(outcome).toMatchObject({
      kind: 'cancelled',
      text: 'The request was cancelled. No document was generated.',
      state: 'Cancelled',
    });
    expect(h.renderer.calls).toHaveLength(0);
    expect(worker.isActive()).toBe(false);
    expect(h.decider.shown[0].action.params.fields.expenseCategory).toBe('事務用品費');

    await worker.advance('New receipt from Cafe', context);

    expect(worker.getState().fields).toEqual({ storeName: 'Cafe' });
    expect(worker.history.list()[0].content).toBe('New receipt from Cafe');
  });

  it('returns to ReadyForAction when rendering fails and resubmits on the next input', async () => {
    const h = createHarness();
    const worker = new ReceiptWorker(h.deps);
    h.completion.push(reply('Thanks.', { type: 'collect', fields: receipt }));
    h.decider.push({ kind: 'approve' }, { kind: 'approve' });
    h.renderer.failNext('disk full');

    const failed = await worker.advance('Receipt from Book Store', context);

    expect(failed).toMatchObject({
      kind: 'render_failed',
      text: 'The document could not be generated. Your entries are kept; send any message to try again.',
      state: 'ReadyForAction',
    });
    expect(worker.getState().fields.amount).toBe(3200);
    expect(worker.getState().pendingAction).toBeUndefined();

    const retried = await worker.advance('try again', context);

    expect(retried.kind).toBe('completed');
    expect(retried.artifactLocation).toBe('/out/render.receipt-2.csv');
    expect(h.completion.requests).toHaveLength(1);
    expect(h.decider.shown[1].action.id).not.toBe(h.decider.shown[0].action.id);
  });

  it('requires supervisor approval above the threshold', async () => {
    const h = createHarness();
    const worker = new ReceiptWorker(h.deps);
    h.completion.push(
      reply('Did a supervisor approve this?', { type: 'collect', fields: { ...receipt, amount: 6000 } }),
      reply('Noted.', { type: 'collect', fields: { supervisorApproved: false } }),
      reply('Great.', { type: 'collect', fields: { supervisorApproved: 'yes' } })
    );
    h.decider.push({ kind: 'approve' });

    const asked = await worker.advance('Receipt for 6000 yen', context);
    expect(asked.text).toBe('Did a supervisor approve this?');
    expect(asked.state).toBe('CollectingFields');

    const refused = await worker.advance('No', context);
    expect(refused.text).toBe(
      'Some values could not be accepted:\nsupervisorApproved: Claims over ¥5,000 need supervisor approval'
    );

    const done = await worker.advance('Actually yes, my manager approved it', context);
    expect(done.kind).toBe('completed');
    expect(h.decider.shown[0].summary).toContain('  Supervisor approval: yes');
    expect(h.decider.shown[0].summary).toContain('¥6,000');
    expect(h.renderer.calls[0].params.total).toBe(6000);
  });
});
