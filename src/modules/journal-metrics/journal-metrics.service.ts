import type { Container } from '../../infra/container.js';
import type { EventBus } from '../../services/event-bus.js';
import type { JournalEvent, JournalEventType } from '../../types/events.js';

export interface JournalMetricsSnapshot {
  startedAt: string;
  events: Record<JournalEventType, number>;
  trades: {
    recorded: number;
    unpriced: number;
    buyVolumeUsd: number;
    sellVolumeUsd: number;
    lastRecordedAt: string | null;
  };
  rejections: Record<string, number>;
  enrichmentFailures: Record<string, number>;
  realizedPnlClosedUsd: number;
}

function emptyEventCounts(): Record<JournalEventType, number> {
  return {
    TRADE_RECORDED: 0,
    TRADE_REJECTED: 0,
    POSITION_OPENED: 0,
    POSITION_CLOSED: 0,
    ENRICHMENT_FAILED: 0,
  };
}

/**
 * In-process counters fed by the event bus. They reset on restart; the
 * journal itself is the durable record.
 */
export class JournalMetrics {
  private readonly container: Container;
  private readonly eventBus: EventBus;
  private readonly startedAt = new Date();
  private events = emptyEventCounts();
  private recorded = 0;
  private unpriced = 0;
  private buyVolumeUsd = 0;
  private sellVolumeUsd = 0;
  private lastRecordedAt: number | null = null;
  private rejections: Record<string, number> = {};
  private enrichmentFailures: Record<string, number> = {};
  private realizedPnlClosedUsd = 0;
  private readonly handler = (event: JournalEvent): void => {
    this.record(event);
  };

  constructor(container: Container, eventBus: EventBus) {
    this.container = container;
    this.eventBus = eventBus;
  }

  start(): void {
    this.eventBus.on(this.handler);
    this.container.logger.info('Journal metrics started');
  }

  stop(): void {
    this.eventBus.off(this.handler);
    this.container.logger.info('Journal metrics stopped');
  }

  reset(): void {
    this.events = emptyEventCounts();
    this.recorded = 0;
    this.unpriced = 0;
    this.buyVolumeUsd = 0;
    this.sellVolumeUsd = 0;
    this.lastRecordedAt = null;
    this.rejections = {};
    this.enrichmentFailures = {};
    this.realizedPnlClosedUsd = 0;
  }

  snapshot(): JournalMetricsSnapshot {
    return {
      startedAt: this.startedAt.toISOString(),
      events: { ...this.events },
      trades: {
        recorded: this.recorded,
        unpriced: this.unpriced,
        buyVolumeUsd: this.buyVolumeUsd,
        sellVolumeUsd: this.sellVolumeUsd,
        lastRecordedAt: this.lastRecordedAt === null ? null : new Date(this.lastRecordedAt).toISOString(),
      },
      rejections: { ...this.rejections },
      enrichmentFailures: { ...this.enrichmentFailures },
      realizedPnlClosedUsd: this.realizedPnlClosedUsd,
    };
  }

  private record(event: JournalEvent): void {
    this.events[event.type] += 1;

    switch (event.type) {
      case 'TRADE_RECORDED':
        this.recorded += 1;
        this.lastRecordedAt = event.timestamp;
        if (!event.applied) this.unpriced += 1;
        if (event.totalValueUsd !== null) {
          if (event.direction === 'BUY') this.buyVolumeUsd += event.totalValueUsd;
          else this.sellVolumeUsd += event.totalValueUsd;
        }
        break;
      case 'TRADE_REJECTED':
        this.rejections[event.code] = (this.rejections[event.code] ?? 0) + 1;
        break;
      case 'ENRICHMENT_FAILED':
        this.enrichmentFailures[event.reason] = (this.enrichmentFailures[event.reason] ?? 0) + 1;
        break;
      case 'POSITION_CLOSED':
        this.realizedPnlClosedUsd += event.realizedPnlUsd;
        break;
      case 'POSITION_OPENED':
        break;
    }
  }
}
