export { BrainMetrics, type MetricSources } from './brain-metrics.js';
