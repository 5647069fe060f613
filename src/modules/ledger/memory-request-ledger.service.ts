import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  RequestLedger,
  StoredWeatherRequest,
  WeatherRequestRecord,
} from './request-ledger.interface';

/**
 * Process-local ledger for the memory storage driver. Keeps the newest
 * entries of each identified caller; anonymous queries are not kept since
 * nothing can read them back.
 */
export class MemoryRequestLedger implements RequestLedger {
  private readonly logger = new Logger(MemoryRequestLedger.name);
  private readonly entriesByUser = new Map<string, StoredWeatherRequest[]>();

  constructor(private readonly maxEntriesPerUser = 1000) {}

  async record(entry: WeatherRequestRecord): Promise<void> {
    const { userId } = entry;
    if (!userId) {
      this.logger.debug('Skipping anonymous request');
      return;
    }

    const entries = this.entriesByUser.get(userId) ?? [];
    entries.push({ ...entry, id: randomUUID(), createdAt: new Date() });
    if (entries.length > this.maxEntriesPerUser) {
      entries.splice(0, entries.length - this.maxEntriesPerUser);
    }
    this.entriesByUser.set(userId, entries);
    this.logger.debug(`Recorded request #${entries.length} for ${userId}`);
  }

  /** Entries kept across all users */
  get size(): number {
    let total = 0;
    for (const entries of this.entriesByUser.values()) total += entries.length;
    return total;
  }

  /** Newest first */
  async findForUser(userId: string): Promise<StoredWeatherRequest[]> {
    return [...(this.entriesByUser.get(userId) ?? [])].reverse();
  }
}
