// Domain events emitted while a report is produced

import { randomUUID } from 'node:crypto';
import type { DimensionId, Rating } from './evidence.js';
import { errorMessage } from './errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface DomainEventPayloads {
  AnalysisRequested: { companyNumber: string };
  ProfileFetched: { companyNumber: string; companyName: string };
  AnalyzerStarted: { dimension: DimensionId; companyNumber: string };
  AnalyzerCompleted: { dimension: DimensionId; rating: Rating; durationMs: number };
  AnalyzerFailed: { dimension: DimensionId; error: string; durationMs: number };
  AnalysisCompleted: { companyNumber: string; analyzedAt: string; elapsedSeconds: number; failed?: number };
}

export type DomainEventType = keyof DomainEventPayloads;

export interface DomainEventOf<K extends DomainEventType> {
  eventId: string;
  type: K;
  timestamp: Date;
  payload: DomainEventPayloads[K];
}

export type DomainEvent = { [K in DomainEventType]: DomainEventOf<K> }[DomainEventType];

export function createEvent<K extends DomainEventType>(type: K, payload: DomainEventPayloads[K]): DomainEventOf<K> {
  return { eventId: randomUUID(), type, timestamp: new Date(), payload };
}

export type EventHandler = (event: DomainEvent) => void;

export interface EventBus {
  publish(event: DomainEvent): void;
  /** Handler for the listed types, or every type when none are given. Returns the unsubscribe function. */
  subscribe(handler: EventHandler, types?: readonly DomainEventType[]): () => void;
}

interface Subscription {
  handler: EventHandler;
  types?: ReadonlySet<DomainEventType>;
}

/**
 * In-process bus. Handlers run synchronously in subscription order; a handler that
 * throws is logged and the remaining handlers still run, so observers cannot break a report.
 */
export class SimpleEventBus implements EventBus {
  private subscriptions: Subscription[] = [];

  constructor(private readonly log: Logger = createLogger('EventBus')) {}

  publish(event: DomainEvent): void {
    for (const { handler, types } of this.subscriptions) {
      if (types && !types.has(event.type)) continue;
      try {
        handler(event);
      } catch (err) {
        this.log.warn('Event handler failed', { type: event.type, eventId: event.eventId, error: errorMessage(err) });
      }
    }
  }

  subscribe(handler: EventHandler, types?: readonly DomainEventType[]): () => void {
    const subscription: Subscription = { handler, types: types ? new Set(types) : undefined };
    this.subscriptions = [...this.subscriptions, subscription];
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s !== subscription);
    };
  }
}
