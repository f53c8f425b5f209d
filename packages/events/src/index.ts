import Redis from 'ioredis';
import { z } from 'zod';
import { createLogger } from '@metrica/config';
import { REPORT_STATUSES } from '@metrica/shared-types';

const log = createLogger('event-bus');

// ─── Event Types ────────────────────────────────────────────────────
const kpiEntryUpdatedSchema = z.object({
  type: z.literal('kpi.entry_updated'),
  organizationId: z.string(),
  kpiId: z.string(),
  entryId: z.string(),
  periodStart: z.string(),
  periodEnd: z.string(),
  value: z.number(),
  isCalculated: z.boolean(),
  created: z.boolean(),
  timestamp: z.string(),
});

const kpiReportStatusChangedSchema = z.object({
  type: z.literal('kpi.report_status_changed'),
  organizationId: z.string(),
  reportId: z.string(),
  kpiId: z.string(),
  fromStatus: z.enum(REPORT_STATUSES),
  toStatus: z.enum(REPORT_STATUSES),
  actorUserId: z.string(),
  timestamp: z.string(),
});

const metricaEventSchema = z.discriminatedUnion('type', [
  kpiEntryUpdatedSchema,
  kpiReportStatusChangedSchema,
]);

export type KpiEntryUpdatedEvent = z.infer<typeof kpiEntryUpdatedSchema>;
export type KpiReportStatusChangedEvent = z.infer<typeof kpiReportStatusChangedSchema>;
export type MetricaEvent = z.infer<typeof metricaEventSchema>;

export type EventHandler = (event: MetricaEvent) => void;

/** Narrow publishing surface that domain services depend on. */
export interface EventPublisher {
  publish(event: MetricaEvent): Promise<void>;
}

// ─── Event Channel Names ────────────────────────────────────────────
const CHANNEL_PREFIX = 'metrica:events';

export function getOrganizationChannel(organizationId: string): string {
  return `${CHANNEL_PREFIX}:${organizationId}`;
}

export function getGlobalChannel(): string {
  return `${CHANNEL_PREFIX}:global`;
}

// ─── Event Bus (Redis Pub/Sub) ──────────────────────────────────────
export class EventBus implements EventPublisher {
  private publisher: Redis;
  private subscriber: Redis;
  private handlers: Map<string, Set<EventHandler>> = new Map();

  constructor(redisUrl: string) {
    this.publisher = new Redis(redisUrl);
    this.subscriber = new Redis(redisUrl);

    this.subscriber.on('message', (channel: string, message: string) => {
      this.dispatch(channel, message);
    });
  }

  private dispatch(channel: string, message: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(message);
    } catch (err) {
      log.error({ err, channel }, 'Failed to parse event');
      return;
    }

    const parsed = metricaEventSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ channel, issues: parsed.error.issues }, 'Dropping event with unknown shape');
      return;
    }

    const channelHandlers = this.handlers.get(channel);
    if (!channelHandlers) return;
    for (const handler of channelHandlers) {
      handler(parsed.data);
    }
  }

  /** Publish an event to its organization's channel and the global channel */
  async publish(event: MetricaEvent): Promise<void> {
    const message = JSON.stringify(event);

    await Promise.all([
      this.publisher.publish(getOrganizationChannel(event.organizationId), message),
      this.publisher.publish(getGlobalChannel(), message),
    ]);
  }

  private async addHandler(channel: string, handler: EventHandler): Promise<void> {
    let channelHandlers = this.handlers.get(channel);
    if (!channelHandlers) {
      channelHandlers = new Set();
      this.handlers.set(channel, channelHandlers);
      await this.subscriber.subscribe(channel);
    }
    channelHandlers.add(handler);
  }

  async subscribeOrganization(organizationId: string, handler: EventHandler): Promise<void> {
    await this.addHandler(getOrganizationChannel(organizationId), handler);
  }

  async subscribeGlobal(handler: EventHandler): Promise<void> {
    await this.addHandler(getGlobalChannel(), handler);
  }

  async unsubscribeOrganization(organizationId: string, handler: EventHandler): Promise<void> {
    const channel = getOrganizationChannel(organizationId);
    const channelHandlers = this.handlers.get(channel);
    if (channelHandlers) {
      channelHandlers.delete(handler);
      if (channelHandlers.size === 0) {
        this.handlers.delete(channel);
        await this.subscriber.unsubscribe(channel);
      }
    }
  }

  /** Health check: verify Redis connectivity */
  async ping(): Promise<boolean> {
    try {
      const result = await this.publisher.ping();
      return result === 'PONG';
    } catch (err) {
      log.warn({ err }, 'Event bus ping failed');
      return false;
    }
  }

  async shutdown(): Promise<void> {
    await this.subscriber.unsubscribe();
    await this.publisher.quit();
    await this.subscriber.quit();
    this.handlers.clear();
  }
}

// ─── Singleton factory ──────────────────────────────────────────────
let eventBusInstance: EventBus | null = null;

export function getEventBus(redisUrl?: string): EventBus {
  if (!eventBusInstance) {
    if (!redisUrl) {
      throw new Error('Redis URL is required to initialize EventBus');
    }
    eventBusInstance = new EventBus(redisUrl);
  }
  return eventBusInstance;
}
