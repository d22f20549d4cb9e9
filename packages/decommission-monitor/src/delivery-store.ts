import fs from "node:fs/promises";
import * as v from "valibot";

export type DeliveryChannel = "webhook" | "issue";

export type DeliveryStatus = "sent" | "failed" | "skipped";

export interface DeliveryRecord {
  eventId: string;
  entityId: string;
  channel: DeliveryChannel;
  status: DeliveryStatus;
  target: string;
  attempts: number;
  payload: Record<string, unknown>;
  errorMessage?: string;
  recordedAt: string;
}

export interface DeliveryStore {
  record(entry: DeliveryRecord): Promise<void>;
  /** Returns true only for the first claim of a key. */
  claimIssue(dedupKey: string, entityId: string): Promise<boolean>;
  releaseIssue(dedupKey: string): Promise<void>;
  listFailures(limit: number): Promise<DeliveryRecord[]>;
}

export class MemoryDeliveryStore implements DeliveryStore {
  private readonly records: DeliveryRecord[] = [];
  private readonly issues = new Map<string, string>();

  constructor(private readonly maxRecords = 1000) {}

  async record(entry: DeliveryRecord): Promise<void> {
    this.records.push(entry);
    while (this.records.length > this.maxRecords) {
      this.records.shift();
    }
  }

  async claimIssue(dedupKey: string, entityId: string): Promise<boolean> {
    if (this.issues.has(dedupKey)) {
      return false;
    }
    this.issues.set(dedupKey, entityId);
    // Oldest claims go first; Map iterates in insertion order.
    for (const oldest of this.issues.keys()) {
      if (this.issues.size <= this.maxRecords) {
        break;
      }
      this.issues.delete(oldest);
    }
    return true;
  }

  async releaseIssue(dedupKey: string): Promise<void> {
    this.issues.delete(dedupKey);
  }

  async listFailures(limit: number): Promise<DeliveryRecord[]> {
    return this.records.filter((item) => item.status === "failed").slice(-limit).reverse();
  }

  all(): DeliveryRecord[] {
    return [...this.records];
  }
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

const deliveryRowSchema = v.object({
  event_id: v.string(),
  entity_id: v.string(),
  channel: v.picklist(["webhook", "issue"]),
  status: v.picklist(["sent", "failed", "skipped"]),
  target: v.string(),
  attempts: v.number(),
  payload: v.record(v.string(), v.unknown()),
  error_message: v.nullable(v.string()),
  recorded_at: v.union([v.date(), v.string()])
});

export class PgDeliveryStore implements DeliveryStore {
  constructor(private readonly db: Queryable) {}

  async ensureSchema(): Promise<void> {
    const ddl = await fs.readFile(new URL("../sql/delivery-store.sql", import.meta.url), "utf8");
    await this.db.query(ddl);
  }

  async record(entry: DeliveryRecord): Promise<void> {
    await this.db.query(
      `insert into delivery_log
      (event_id, entity_id, channel, status, target, attempts, payload, error_message, recorded_at)
      values ($1, $2, $3, $4, $5, $6, $7::jsonb, $8, $9)`,
      [
        entry.eventId,
        entry.entityId,
        entry.channel,
        entry.status,
        entry.target,
        entry.attempts,
        JSON.stringify(entry.payload),
        entry.errorMessage ?? null,
        entry.recordedAt
      ]
    );
  }

  async claimIssue(dedupKey: string, entityId: string): Promise<boolean> {
    const result = await this.db.query(
      `insert into issue_ledger (dedup_key, entity_id)
      values ($1, $2)
      on conflict (dedup_key) do nothing`,
      [dedupKey, entityId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async releaseIssue(dedupKey: string): Promise<void> {
    await this.db.query("delete from issue_ledger where dedup_key = $1", [dedupKey]);
  }

  async listFailures(limit: number): Promise<DeliveryRecord[]> {
    const result = await this.db.query(
      `select event_id, entity_id, channel, status, target, attempts, payload, error_message, recorded_at
      from delivery_log
      where status = 'failed'
      order by recorded_at desc
      limit $1`,
      [limit]
    );

    const records: DeliveryRecord[] = [];
    for (const raw of result.rows) {
      const parsed = v.safeParse(deliveryRowSchema, raw);
      if (!parsed.success) {
        continue;
      }
      const row = parsed.output;
      records.push({
        eventId: row.event_id,
        entityId: row.entity_id,
        channel: row.channel,
        status: row.status,
        target: row.target,
        attempts: row.attempts,
        payload: row.payload,
        errorMessage: row.error_message ?? undefined,
        recordedAt: row.recorded_at instanceof Date ? row.recorded_at.toISOString() : row.recorded_at
      });
    }
    return records;
  }
}
