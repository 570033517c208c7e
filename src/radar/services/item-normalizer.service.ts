import { Injectable, Logger } from '@nestjs/common';
import {
  SOURCE_TIER_1,
  SOURCE_TIER_2,
  SUMMARY_MAX_CHARS,
} from '../config/radar.constants';
import { MalformedItemError } from '../errors/radar.errors';
import {
  NormalizeResult,
  NormalizedItem,
  RawItem,
  RejectedItem,
  SourceTier,
} from '../types/radar.types';
import { parseDateToIso } from '../utils/date.util';
import { cleanText, hostnameOf, truncate } from '../utils/text.util';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return '';
}

@Injectable()
export class ItemNormalizerService {
  private readonly logger = new Logger(ItemNormalizerService.name);

  /**
   * Validates, dedupes (last-seen-wins on `event_uid`) and orders items by
   * date then `event_uid`. Malformed entries are logged and reported in
   * `rejected`; they never abort the batch.
   */
  normalize(items: readonly unknown[]): NormalizeResult {
    const byUid = new Map<string, NormalizedItem>();
    const rejected: RejectedItem[] = [];
    let duplicates = 0;

    items.forEach((value, index) => {
      try {
        const item = this.normalizeOne(this.readRawItem(value, index), index);
        if (byUid.has(item.eventUid)) {
          duplicates += 1;
        }
        byUid.set(item.eventUid, item);
      } catch (error) {
        if (!(error instanceof MalformedItemError)) {
          throw error;
        }
        this.logger.warn(error.message);
        rejected.push({
          index,
          eventUid:
            typeof error.context.eventUid === 'string'
              ? error.context.eventUid
              : null,
          reason: error.reason,
        });
      }
    });

    const normalized = [...byUid.values()].sort(
      (a, b) =>
        a.dateMs - b.dateMs ||
        (a.eventUid < b.eventUid ? -1 : a.eventUid > b.eventUid ? 1 : 0),
    );

    return { items: normalized, rejected, duplicates };
  }

  toRawItem(item: NormalizedItem): RawItem {
    return {
      event_uid: item.eventUid,
      date: item.date,
      title: item.title,
      url: item.url,
      raw_text: item.text,
      source_name: item.sourceTag,
      source_tier: item.sourceTier,
      signal_type: item.signalType ?? undefined,
    };
  }

  private readRawItem(value: unknown, index: number): RawItem {
    if (!isRecord(value)) {
      throw new MalformedItemError('item is not an object', { index });
    }
    const tier = value.source_tier;
    return {
      event_uid: stringField(value, 'event_uid').trim(),
      date: stringField(value, 'date').trim(),
      title: stringField(value, 'title'),
      url: stringField(value, 'url').trim(),
      raw_text: stringField(value, 'raw_text'),
      source_name: stringField(value, 'source_name') || undefined,
      source_tier: typeof tier === 'number' ? tier : undefined,
      signal_type: stringField(value, 'signal_type') || undefined,
    };
  }

  private normalizeOne(raw: RawItem, index: number): NormalizedItem {
    const eventUid = raw.event_uid;
    if (!eventUid) {
      throw new MalformedItemError('missing event_uid', { index });
    }
    if (!raw.date) {
      throw new MalformedItemError('missing date', { index, eventUid });
    }
    const date = parseDateToIso(raw.date);
    if (!date) {
      throw new MalformedItemError(`unparseable date "${raw.date}"`, {
        index,
        eventUid,
      });
    }
    const title = cleanText(raw.title);
    if (!title) {
      throw new MalformedItemError('missing title', { index, eventUid });
    }

    const text = cleanText(raw.raw_text);
    const sourceTag = this.sourceTagOf(raw);
    return {
      eventUid,
      date,
      dateMs: Date.parse(date),
      title,
      url: raw.url,
      text,
      summary: truncate(text || title, SUMMARY_MAX_CHARS),
      sourceTag,
      sourceTier: this.sourceTierOf(raw.source_tier, sourceTag),
      signalType: raw.signal_type?.trim().toLowerCase() || null,
    };
  }

  private sourceTagOf(raw: RawItem): string {
    const explicit = cleanText(raw.source_name ?? '');
    if (explicit) {
      return explicit;
    }
    return hostnameOf(raw.url) || 'unknown';
  }

  private sourceTierOf(
    explicit: number | undefined,
    sourceTag: string,
  ): SourceTier {
    if (explicit === 1 || explicit === 2 || explicit === 3) {
      return explicit;
    }
    const key = sourceTag.toLowerCase();
    if (SOURCE_TIER_1.has(key)) {
      return 1;
    }
    if (SOURCE_TIER_2.has(key)) {
      return 2;
    }
    return 3;
  }
}
