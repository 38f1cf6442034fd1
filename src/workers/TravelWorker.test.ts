/**
 * TravelWorker Tests
 *
 * Tests for:
 * - Multi-item collection with fare lookup
 * - Revise then approve with two items
 * - Commuter route refusal
 * - Tool actions and the per-turn loop bound
 * - Resuming a pending action after a decider failure
 */

import { describe, it, expect, vi } from 'vitest';
import { ContextBag } from '../context/ContextBag.js';
import type { PersistedWorker } from '../types/index.js';
import { LoopLimitExceeded } from '../utils/errors.js';
import { createHarness, reply } from '../../tests/helpers/fakes.js';
import { TravelWorker } from './TravelWorker.js';

const context = ContextBag.from({ requesterId: 'test-user', sessionId: 'test-session' });

const firstRoute = {
  date: '2026-10-01',
  departure: '東京',
  destination: '新宿',
  transportType: 'train',
};

const secondRoute = {
  date: '2026-10-02',
  departure: '東京',
  destination: '品川',
  transportType: 'train',
};

describe('TravelWorker', () => {
  it('fills the fare and asks whether another route follows', async () => {
    const h = createHarness();
    const worker = new TravelWorker(h.deps);
    h.completion.push(reply('Got it.', { type: 'collect', fields: { purpose: 'client visit' }, items: [{ fields: firstRoute }] }));

    const outcome = await worker.advance('Train from 東京 to 新宿 on 10/1 for a client visit', context);

    expect(outcome.kind).toBe('reply');
    expect(outcome.state).toBe('CollectingFields');
    expect(outcome.text).toBe('Got it.\n\nIs there another route to add? If not, tell me there are no more.');
    expect(worker.getState().items).toEqual([{ ...firstRoute, cost: 210 }]);

    const toolTurn = worker.history.lastOf('tool');
    expect(toolTurn && JSON.parse(toolTurn.content)).toEqual({
      toolId: 'fare.lookup',
      ok: true,
      data: { fare: 210, transportType: 'train', source: 'route' },
    });
  });

  it('revises the second item and renders the approved claim', async () => {
    const h = createHarness();
    const worker = new TravelWorker(h.deps);

    h.completion.push(
      reply('Which routes?', { type: 'collect', fields: { purpose: 'client visit' } }),
      reply('Got it.', { type: 'collect', items: [{ fields: firstRoute }] }),
      reply('Thanks.', { type: 'collect', items: [{ fields: secondRoute }], noMoreItems: true }),
      reply('', { type: 'collect', items: [{ index: 2, fields: { date: '2026-10-03' } }] })
    );
    h.decider.push({ kind: 'revise', feedback: 'Item 2 date should be 2026-10-03' }, { kind: 'approve' });

    await worker.advance('I visited a client', context);
    await worker.advance('2026-10-01 東京 to 新宿 by train', context);
    const outcome = await worker.advance('Also 2026-10-02 東京 to 品川, that is all', context);

    expect(outcome).toEqual({
      kind: 'completed',
      text: 'Approved. The document was saved to /out/render.travel-1.csv',
      state: 'Completed',
      artifactLocation: '/out/render.travel-1.csv',
    });

    expect(h.decider.shown).toHaveLength(2);
    expect(h.decider.shown[0].action.params.items[1].date).toBe('2026-10-02');
    expect(h.decider.shown[0].summary).toContain('  2. 2026-10-02  東京 → 品川  train  ¥180');
    expect(h.decider.shown[1].action.params.items[1].date).toBe('2026-10-03');
    expect(h.decider.shown[1].action.id).not.toBe(h.decider.shown[0].action.id);

    const lastRequest = h.completion.requests[3];
    expect(lastRequest.history[lastRequest.history.length - 1].content).toBe(
      'Revision requested: Item 2 date should be 2026-10-03'
    );

    expect(h.renderer.calls).toHaveLength(1);
    expect(h.renderer.calls[0].actionId).toBe('render.travel');
    expect(h.renderer.calls[0].params).toEqual({
      fields: { purpose: 'client visit' },
      items: [
        { ...firstRoute, cost: 210 },
        { ...secondRoute, date: '2026-10-03', cost: 180 },
      ],
      total: 390,
    });
    expect(h.renderer.calls[0].context).toEqual({
      requesterId: 'test-user',
      sessionId: 'test-session',
      workerType: 'travel',
    });
    expect(worker.history.list().filter((turn) => turn.pinned)).toHaveLength(0);
    expect(worker.getState().pendingAction).toBeUndefined();
  });

  it('refuses a commuter pass route without looking up a fare', async () => {
    const h = createHarness();
    const worker = new TravelWorker(h.deps);
    h.completion.push(
      reply('Recorded.', {
        type: 'collect',
        items: [{ fields: { date: '2026-10-05', departure: '上野駅', destination: '豊洲', transportType: '電車' } }],
      })
    );

    const outcome = await worker.advance('上野 to 豊洲 by train on 10/5', context);

    expect(outcome.text).toBe(
      'Some values could not be accepted:\nItem 1: departure: 上野駅–豊洲 is covered by the commuter pass and cannot be claimed'
    );
    expect(worker.getState().items).toEqual([]);
    expect(worker.getState().lastErrors).toHaveLength(1);
    expect(worker.history.lastOf('tool')).toBeUndefined();
  });

  it('drops a looked-up cost when the route changes', async () => {
    const h = createHarness();
    const worker = new TravelWorker(h.deps);
    h.completion.push(
      reply('Got it.', { type: 'collect', items: [{ fields: firstRoute }] }),
      reply('Changed.', { type: 'collect', items: [{ index: 1, fields: { destination: '品川' } }] })
    );

    await worker.advance('東京 to 新宿', context);
    await worker.advance('Sorry, it was 品川', context);

    expect(worker.getState().items[0].cost).toBe(180);
  });

  it('feeds non-gated tool results back and refuses gated ones', async () => {
    const h = createHarness();
    const worker = new TravelWorker(h.deps);
    h.completion.push(
      reply('', { type: 'tool', toolId: 'render.travel', input: {} }),
      reply('', { type: 'tool', toolId: 'fare.lookup', input: { departure: '東京', destination: '品川', transportType: 'train' } }),
      reply('That fare is ¥180.')
    );

    const outcome = await worker.advance('How much is 東京 to 品川?', context);

    expect(outcome.text).toBe('That fare is ¥180.');
    expect(h.renderer.calls).toHaveLength(0);
    const toolTurns = worker.history.list().filter((turn) => turn.role === 'tool').map((turn) => JSON.parse(turn.content));
    expect(toolTurns[0]).toEqual({
      toolId: 'render.travel',
      ok: false,
      error: "Tool 'render.travel' runs only after the user approves the final summary",
    });
    expect(toolTurns[1].data).toEqual({ fare: 180, transportType: 'train', source: 'route' });
  });

  it('stops a turn at the loop bound and keeps the fields', async () => {
    const h = createHarness({ config: { loopLimits: { dispatcher: 10, worker: 2 } } });
    const worker = new TravelWorker(h.deps);
    const lookup = { type: 'tool' as const, toolId: 'fare.lookup', input: { departure: '東京', destination: '新宿', transportType: 'bus' } };
    h.completion.push(
      reply('Noted.', { type: 'collect', fields: { purpose: 'training' } }),
      reply('', lookup),
      reply('', lookup),
      reply('', lookup)
    );

    await worker.advance('For a training session', context);
    await expect(worker.advance('What would a bus cost?', context)).rejects.toBeInstanceOf(LoopLimitExceeded);

    expect(h.completion.requests).toHaveLength(3);
    expect(worker.getState().state).toBe('Idle');
    expect(worker.getState().fields).toEqual({ purpose: 'training' });
    expect(worker.isActive()).toBe(true);
  });

  it('keeps an unanswered approval and resumes it from the saved state', async () => {
    const h = createHarness();
    const checkpoint = vi.fn(async () => {});
    const worker = new TravelWorker({ ...h.deps, checkpoint });
    h.completion.push(
      reply('Thanks.', {
        type: 'collect',
        fields: { purpose: 'client visit' },
        items: [{ fields: firstRoute }],
        noMoreItems: true,
      })
    );

    // No scripted decision: the decider throws.
    await expect(worker.advance('東京 to 新宿 on 10/1, client visit, only one', context)).rejects.toThrow(
      'No scripted decision left'
    );
    expect(checkpoint).toHaveBeenCalledTimes(1);
    expect(worker.getState().state).toBe('AwaitingApproval');
    expect(worker.getState().pendingAction?.status).toBe('requested');
    expect(worker.history.list().filter((turn) => turn.pinned)).toHaveLength(1);

    const saved: PersistedWorker = JSON.parse(JSON.stringify(worker.toJSON()));
    const restored = new TravelWorker(h.deps, saved);
    h.decider.push({ kind: 'approve' });

    const outcome = await restored.resume(context);

    expect(outcome?.kind).toBe('completed');
    expect(h.decider.shown).toHaveLength(2);
    expect(h.decider.shown[1].action.id).toBe(h.decider.shown[0].action.id);
    expect(restored.getState().state).toBe('Completed');
    expect(h.renderer.calls[0].params.total).toBe(210);
  });

  it('has nothing to resume when no action is pending', async () => {
    const h = createHarness();
    const worker = new TravelWorker(h.deps);
    await expect(worker.resume(context)).resolves.toBeNull();
  });
});
