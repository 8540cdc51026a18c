import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type {
  LedgerEvent,
  MarketplaceState,
  SimulatedItemContracts,
  SimulatedPaymentRails,
} from './engine';
import { parseLedger, stringifyLedger, toWire, type Wire } from './ledger-codec';

const SNAPSHOT_ROW_ID = 1;

/** Everything needed to bring the runtime back after a restart. */
export interface PersistedMarketplace {
  ledger: MarketplaceState;
  items: ReturnType<SimulatedItemContracts['snapshot']>;
  rails: ReturnType<SimulatedPaymentRails['snapshot']>;
}

export interface StoredLedgerEvent {
  id: number;
  recordedAt: Date;
  event: Wire<LedgerEvent>;
}

@Injectable()
export class MarketplacePersistenceService {
  constructor(private readonly db: DatabaseService) {}

  /* ------------------------------------------------------------------ */
  /*  WRITES                                                             */
  /* ------------------------------------------------------------------ */

  /** Replace the snapshot and append the committed events, atomically. */
  async persistCommit(
    snapshot: PersistedMarketplace,
    events: LedgerEvent[],
  ): Promise<void> {
    await this.db.transaction(async (client) => {
      await client.query(
        `INSERT INTO marketplace_snapshots (id, state, updated_at)
         VALUES ($1, $2::jsonb, now())
         ON CONFLICT (id) DO UPDATE
           SET state = EXCLUDED.state, updated_at = EXCLUDED.updated_at`,
        [SNAPSHOT_ROW_ID, stringifyLedger(snapshot)],
      );
      for (const event of events) {
        await client.query(
          'INSERT INTO ledger_events (type, payload) VALUES ($1, $2::jsonb)',
          [event.type, JSON.stringify(toWire(event))],
        );
      }
    });
  }

  /* ------------------------------------------------------------------ */
  /*  READS                                                              */
  /* ------------------------------------------------------------------ */

  async loadSnapshot(): Promise<PersistedMarketplace | null> {
    const rows = await this.db.query<{ state: string }>(
      'SELECT state::text AS state FROM marketplace_snapshots WHERE id = $1',
      [SNAPSHOT_ROW_ID],
    );
    const row = rows[0];
    return row ? parseLedger<PersistedMarketplace>(row.state) : null;
  }

  /** Committed events after `afterId`, oldest first. */
  async listEvents(afterId: number, limit: number): Promise<StoredLedgerEvent[]> {
    const rows = await this.db.query<{
      id: string;
      recorded_at: Date;
      payload: Wire<LedgerEvent>;
    }>(
      `SELECT id, recorded_at, payload FROM ledger_events
       WHERE id > $1 ORDER BY id ASC LIMIT $2`,
      [afterId, limit],
    );
    return rows.map((row) => ({
      id: Number(row.id),
      recordedAt: row.recorded_at,
      event: row.payload,
    }));
  }
}
