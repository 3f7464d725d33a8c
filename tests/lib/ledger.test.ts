import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DeliveryLedger, LedgerError, ledgerKey, parseLedgerDocument, LEDGER_VERSION } from '@/lib/ledger.js';

describe('DeliveryLedger', () => {
  let testDir: string;
  let ledgerPath: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `clipcourier-ledger-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    ledgerPath = join(testDir, 'ledger.json');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('opens a missing ledger as empty', async () => {
    const ledger = await DeliveryLedger.open(ledgerPath);

    expect(ledger.size).toBe(0);
    expect(ledger.has(ledgerKey(0, 'a.mp4'))).toBe(false);
  });

  it('persists recorded deliveries and reloads them', async () => {
    const ledger = await DeliveryLedger.open(ledgerPath);
    const entry = { destination_key: '2024-05-01/clip.mp4', delivered_at: '2024-05-01T10:00:00.000Z', size_bytes: 12 };

    await ledger.record(ledgerKey(0, 'Mp4Record/a.mp4'), entry);

    expect(JSON.parse(await readFile(ledgerPath, 'utf-8'))).toEqual({
      version: LEDGER_VERSION,
      delivered: { 'ch0:Mp4Record/a.mp4': entry },
    });
    const reopened = await DeliveryLedger.open(ledgerPath);
    expect(reopened.get('ch0:Mp4Record/a.mp4')).toEqual(entry);
    expect(reopened.has('ch1:Mp4Record/a.mp4')).toBe(false);
  });

  it('rejects a malformed ledger instead of starting over', async () => {
    await writeFile(ledgerPath, JSON.stringify({ version: 1, delivered: { x: { destination_key: 3 } } }), 'utf-8');

    await expect(DeliveryLedger.open(ledgerPath)).rejects.toThrow(`Delivery ledger ${ledgerPath} is malformed`);
  });

  it('rejects an unparsable ledger', async () => {
    await writeFile(ledgerPath, '{', 'utf-8');

    await expect(DeliveryLedger.open(ledgerPath)).rejects.toBeInstanceOf(LedgerError);
  });
});

describe('parseLedgerDocument', () => {
  it('rejects other versions and shapes', () => {
    expect(parseLedgerDocument({ version: 2, delivered: {} })).toBeNull();
    expect(parseLedgerDocument({ version: 1, delivered: [] })).toBeNull();
    expect(parseLedgerDocument(null)).toBeNull();
  });

  it('accepts entries without a known size', () => {
    const entry = { destination_key: 'k', delivered_at: 't', size_bytes: null };
    expect(parseLedgerDocument({ version: 1, delivered: { a: entry } })).toEqual({
      version: 1,
      delivered: { a: entry },
    });
  });
});
