import type { EventPublisher } from '@metrica/events';
import type { AggregationDispatcher } from './services/aggregation-dispatcher.js';
import type { KpiStore } from './services/kpi-store.js';
import type { UserDirectory } from './services/user-directory.js';

/**
 * Collaborators shared by every route and background job. Each service
 * declares the subset it needs, so the context can be passed straight through.
 */
export interface ServiceContext {
  store: KpiStore;
  directory: UserDirectory;
  events: EventPublisher;
  dispatcher: AggregationDispatcher;
  now?: () => Date;
}
