export type { Logger, MetricsSink, RequestMetric, HttpTransport } from './types';
export { ConsoleLogger } from './consoleLogger';
