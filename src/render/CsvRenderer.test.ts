/**
 * CsvRenderer Tests
 *
 * Tests for cell escaping, document layouts and write failures.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ContextBag } from '../context/ContextBag.js';
import { createTestLogger } from '../../tests/helpers/fakes.js';
import { CsvRenderer, escapeCsvCell, toCsv } from './CsvRenderer.js';

const NOW = new Date(2026, 9, 19, 8, 5, 3);

const context = ContextBag.from({ requesterId: 'Sato', applicationDate: '2026-10-19' });

describe('escapeCsvCell', () => {
  it.each([
    ['plain', 'plain'],
    ['a,b', '"a,b"'],
    ['say "hi"', '"say ""hi"""'],
    ['two\nlines', '"two\nlines"'],
    ['=HYPERLINK("x")', '"\'=HYPERLINK(""x"")"'],
    ['@SUM(A1)', "'@SUM(A1)"],
    ['+1', "'+1"],
    ['-2', "'-2"],
    ['\tcmd', "'\tcmd"],
  ])('escapes %j', (input, expected) => {
    expect(escapeCsvCell(input)).toBe(expected);
  });

  it('writes numbers as-is', () => {
    expect(toCsv([[1, 'x'], []])).toBe('1,x\r\n\r\n');
    expect(toCsv([[-5]])).toBe('-5\r\n');
  });
});

describe('CsvRenderer', () => {
  let dir: string;
  let renderer: CsvRenderer;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'intakebot-render-'));
    renderer = new CsvRenderer(path.join(dir, 'out'), createTestLogger(), () => NOW);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('renders a travel claim', async () => {
    const result = await renderer.render(
      'render.travel',
      {
        fields: { purpose: 'client visit' },
        items: [
          { date: '2026-10-01', departure: '東京', destination: '新宿', transportType: 'train', cost: 210 },
          { date: '2026-10-02', departure: '新宿', destination: '東京', transportType: 'train', cost: 210, notes: 'late, return' },
        ],
        total: 420,
      },
      context
    );

    expect(result.success).toBe(true);
    const location = result.artifactLocation ?? '';
    expect(path.dirname(location)).toBe(path.join(dir, 'out'));
    expect(path.basename(location)).toMatch(/^travel_expense_20261019_080503_[0-9a-f]{8}\.csv$/);

    const content = await fs.readFile(location, 'utf8');
    expect(content.startsWith('\uFEFF')).toBe(true);
    expect(content.slice(1).split('\r\n')).toEqual([
      'Travel Expense Report',
      'Applicant,Sato',
      'Application date,2026-10-19',
      'Purpose,client visit',
      '',
      'No.,Date,Departure,Destination,Transport,Cost,Notes',
      '1,2026-10-01,東京,新宿,train,210,',
      '2,2026-10-02,新宿,東京,train,210,"late, return"',
      'Total,,,,,420,',
      '',
    ]);
  });

  it('renders a receipt claim with supervisor approval', async () => {
    const result = await renderer.render(
      'render.receipt',
      {
        fields: {
          storeName: 'Book Store',
          date: '2026-10-10',
          items: ['notebook', 'pens'],
          expenseCategory: '事務用品費',
          purpose: 'team supplies',
          supervisorApproved: true,
        },
        items: [],
        total: 6400,
      },
      ContextBag.empty()
    );

    const content = await fs.readFile(result.artifactLocation ?? '', 'utf8');
    expect(content.slice(1).split('\r\n')).toEqual([
      'Receipt Expense Report',
      'Applicant,unknown',
      'Application date,2026-10-19',
      'Store,Book Store',
      'Receipt date,2026-10-10',
      'Items,notebook; pens',
      'Category,事務用品費',
      'Purpose,team supplies',
      'Amount,6400',
      'Supervisor approval,yes',
      '',
    ]);
  });

  it('fails for an unknown layout', async () => {
    const result = await renderer.render('render.unknown', { fields: {}, items: [], total: 0 }, context);

    expect(result).toEqual({ success: false, errorMessage: 'No document layout for render.unknown' });
  });

  it('reports a write failure instead of throwing', async () => {
    const blocked = path.join(dir, 'not-a-directory');
    await fs.writeFile(blocked, 'x');
    const failing = new CsvRenderer(blocked, createTestLogger(), () => NOW);

    const result = await failing.render('render.receipt', { fields: {}, items: [], total: 0 }, context);

    expect(result.success).toBe(false);
    expect(result.errorMessage).toEqual(expect.any(String));
    expect(result.artifactLocation).toBeUndefined();
  });

  it('removes the temp file when the rename fails', async () => {
    const rename = vi.spyOn(fs, 'rename').mockRejectedValueOnce(new Error('rename failed'));

    try {
      const result = await renderer.render('render.receipt', { fields: {}, items: [], total: 0 }, context);

      expect(result).toEqual({ success: false, errorMessage: 'rename failed' });
      expect(await fs.readdir(path.join(dir, 'out'))).toEqual([]);
    } finally {
      rename.mockRestore();
    }
  });

  it('writes to the output directory carried by the context', async () => {
    const override = path.join(dir, 'reports');
    const result = await renderer.render(
      'render.receipt',
      { fields: {}, items: [], total: 0 },
      context.with({ outputDirectory: override })
    );

    expect(path.dirname(result.artifactLocation ?? '')).toBe(override);
  });
});
