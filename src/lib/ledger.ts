/**
 * Delivery ledger.
 *
 * Records every clip whose delivery was confirmed by the storage target, so a
 * later run recognizes it without touching the camera, even after the local
 * copy has been deleted. Persisted atomically after every change.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { atomicReadJson, atomicWriteJson, AtomicFsError } from './fs.js';

export const LEDGER_VERSION = 1;

export interface DeliveryEntry {
  destination_key: string;
  /** ISO timestamp of the confirmed delivery */
  delivered_at: string;
  size_bytes: number | null;
}

export interface LedgerDocument {
  version: typeof LEDGER_VERSION;
  delivered: Record<string, DeliveryEntry>;
}

/**
 * Error thrown when an existing ledger file cannot be read or understood.
 */
export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly ledgerPath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

/**
 * Ledger key of a clip: camera-side ids are only unique per channel.
 */
export function ledgerKey(channel: number, remoteId: string): string {
  return `ch${channel}:${remoteId}`;
}

function isDeliveryEntry(value: unknown): value is DeliveryEntry {
  if (typeof value !== 'object' || value === null) return false;
  const entry: Record<string, unknown> = { ...value };
  return (
    typeof entry['destination_key'] === 'string' &&
    typeof entry['delivered_at'] === 'string' &&
    (entry['size_bytes'] === null || typeof entry['size_bytes'] === 'number')
  );
}

/**
 * Validates a parsed ledger file.
 *
 * @returns null if the document does not have the ledger shape
 */
export function parseLedgerDocument(raw: unknown): LedgerDocument | null {
  if (typeof raw !== 'object' || raw === null) return null;
  const doc: Record<string, unknown> = { ...raw };
  if (doc['version'] !== LEDGER_VERSION) return null;
  const delivered = doc['delivered'];
  if (typeof delivered !== 'object' || delivered === null || Array.isArray(delivered)) return null;

  const entries: Record<string, DeliveryEntry> = {};
  for (const [key, entry] of Object.entries(delivered)) {
    if (!isDeliveryEntry(entry)) return null;
    entries[key] = entry;
  }
  return { version: LEDGER_VERSION, delivered: entries };
}

export class DeliveryLedger {
  private constructor(
    readonly ledgerPath: string,
    private readonly delivered: Map<string, DeliveryEntry>
  ) {}

  /**
   * Opens the ledger at `ledgerPath`; a missing file is an empty ledger.
   *
   * @throws {LedgerError} If the file exists but is unreadable or malformed
   */
  static async open(ledgerPath: string): Promise<DeliveryLedger> {
    let raw: unknown;
    try {
      raw = await atomicReadJson(ledgerPath);
    } catch (error) {
      if (error instanceof AtomicFsError && error.code === 'ENOENT') {
        return new DeliveryLedger(ledgerPath, new Map());
      }
      throw new LedgerError(
        `Failed to read delivery ledger ${ledgerPath}: ${error instanceof Error ? error.message : String(error)}`,
        ledgerPath,
        error instanceof Error ? error : undefined
      );
    }

    const doc = parseLedgerDocument(raw);
    if (!doc) {
      throw new LedgerError(`Delivery ledger ${ledgerPath} is malformed`, ledgerPath);
    }
    return new DeliveryLedger(ledgerPath, new Map(Object.entries(doc.delivered)));
  }

  get size(): number {
    return this.delivered.size;
  }

  has(key: string): boolean {
    return this.delivered.has(key);
  }

  get(key: string): DeliveryEntry | undefined {
    return this.delivered.get(key);
  }

  /**
   * Records a confirmed delivery and persists the ledger.
   *
   * The entry only becomes visible through `has` once the write succeeded.
   *
   * @throws {AtomicFsError} If the ledger file cannot be written
   */
  async record(key: string, entry: DeliveryEntry): Promise<void> {
    const next = new Map(this.delivered).set(key, entry);
    await mkdir(dirname(this.ledgerPath), { recursive: true });
    await atomicWriteJson<LedgerDocument>(this.ledgerPath, {
      version: LEDGER_VERSION,
      delivered: Object.fromEntries(next),
    });
    this.delivered.set(key, entry);
  }
}
