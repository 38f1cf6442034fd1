/**
 * SystemPromptBuilder Tests
 *
 * Tests for:
 * - Identity and runtime sections
 * - Dispatcher routing section
 * - Worker field and rule sections
 * - Tool listing
 */

import { describe, it, expect } from 'vitest';
import { SystemPromptBuilder, type SystemPromptConfig } from './SystemPromptBuilder.js';

describe('SystemPromptBuilder', () => {
  const dispatcherConfig: SystemPromptConfig = {
    identity: { name: 'the intake desk', description: 'a front desk for expense claims.' },
    role: 'dispatcher',
    workers: [
      { type: 'travel', description: 'transportation expenses' },
      { type: 'receipt', description: 'purchases with a receipt' },
    ],
    today: '2026-10-19',
  };

  const workerConfig: SystemPromptConfig = {
    identity: { name: 'the travel clerk', description: 'who collects travel expenses.' },
    role: 'worker',
    fields: [
      { name: 'purpose', description: 'why the trip was made', required: true, scope: 'header' },
      { name: 'date', description: 'travel date', required: true, scope: 'item' },
      { name: 'notes', description: 'anything else', required: false, scope: 'item' },
    ],
    multiItem: true,
    rules: ['Amounts are whole yen'],
    tools: [{ id: 'fare.lookup', description: 'Look up a fare', schema: { type: 'object' } }],
    today: '2026-10-19',
    state: '{"fields":{}}',
  };

  describe('build()', () => {
    it('starts with the identity section', () => {
      const prompt = new SystemPromptBuilder(dispatcherConfig).build();
      expect(prompt.startsWith('You are the intake desk, a front desk for expense claims.')).toBe(true);
    });

    it('lists routing targets for the dispatcher', () => {
      const prompt = new SystemPromptBuilder(dispatcherConfig).build();
      expect(prompt).toContain('- `travel`: transportation expenses');
      expect(prompt).toContain('- `receipt`: purchases with a receipt');
      expect(prompt).toContain('{"type": "route", "workerType": "<type>"}');
      expect(prompt).not.toContain('## Fields');
    });

    it('says so when there are no handlers', () => {
      const prompt = new SystemPromptBuilder({ ...dispatcherConfig, workers: [] }).build();
      expect(prompt).toContain('## Handlers\n\n(No handlers available)');
    });

    it('lists header and item fields for a worker', () => {
      const prompt = new SystemPromptBuilder(workerConfig).build();
      expect(prompt).toContain('- `purpose` (required): why the trip was made');
      expect(prompt).toContain('Each item (collect one item at a time, then ask whether there is another):');
      expect(prompt).toContain('- `notes`: anything else');
      expect(prompt).not.toContain('## Handlers');
    });

    it('includes rules and tools when given', () => {
      const prompt = new SystemPromptBuilder(workerConfig).build();
      expect(prompt).toContain('## Rules\n- Amounts are whole yen');
      expect(prompt).toContain('### fare.lookup\nLook up a fare\nInput schema: {"type":"object"}');
    });

    it('omits rules and tools sections when empty', () => {
      const prompt = new SystemPromptBuilder({ ...workerConfig, rules: [], tools: [] }).build();
      expect(prompt).not.toContain('## Rules');
      expect(prompt).not.toContain('## Tools');
    });

    it('ends with the runtime section', () => {
      const prompt = new SystemPromptBuilder(workerConfig).build();
      expect(prompt.endsWith('## Runtime\nToday: 2026-10-19\nCollected so far: {"fields":{}}')).toBe(true);
    });

    it('leaves out the snapshot line when there is no state', () => {
      const prompt = new SystemPromptBuilder(dispatcherConfig).build();
      expect(prompt.endsWith('## Runtime\nToday: 2026-10-19')).toBe(true);
    });
  });
});
