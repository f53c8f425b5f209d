export {
  createAggregationProcessor,
  startAggregationWorker,
  stopAggregationWorker,
} from './kpi-aggregation.worker.js';
export type { AggregationWorkerInstance, AggregationWorkerOptions } from './kpi-aggregation.worker.js';
