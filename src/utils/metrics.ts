import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';
import { logger } from './logger.js';

class MetricsCollector {
  readonly register: Registry;
  private readonly websocketConnections: Gauge<string>;
  private readonly httpRequestDuration: Histogram<string>;
  private readonly editsTotal: Counter<string>;
  private readonly notificationsDropped: Counter<string>;

  constructor() {
    this.register = new Registry();

    // Enable default Node.js metrics
    collectDefaultMetrics({
      register: this.register,
      prefix: 'node_',
      gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
    });

    this.websocketConnections = new Gauge({
      name: 'oscquery_websocket_connections',
      help: 'Number of open WebSocket connections',
      registers: [this.register],
    });

    this.httpRequestDuration = new Histogram({
      name: 'oscquery_http_request_duration_milliseconds',
      help: 'Duration of HTTP requests in milliseconds',
      labelNames: ['method', 'route', 'status_code'],
      buckets: [1, 2, 5, 10, 25, 50, 100, 250, 500, 1000],
      registers: [this.register],
    });

    this.editsTotal = new Counter({
      name: 'oscquery_edits_total',
      help: 'Namespace edits applied or rejected by the mutation coordinator',
      labelNames: ['kind', 'outcome'],
      registers: [this.register],
    });

    this.notificationsDropped = new Counter({
      name: 'oscquery_subscribers_dropped_total',
      help: 'Subscribers detached after a failed or overflowing delivery',
      labelNames: ['reason'],
      registers: [this.register],
    });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    try {
      return await this.register.metrics();
    } catch (error) {
      logger.error('Failed to collect metrics', { error });
      return '';
    }
  }

  setWebSocketConnections(active: number): void {
    this.websocketConnections.set(active);
  }

  trackHttpRequest(method: string, route: string, statusCode: number, durationMs: number): void {
    this.httpRequestDuration.labels(method, route, statusCode.toString()).observe(durationMs);
  }

  trackEdit(kind: string, outcome: string): void {
    this.editsTotal.labels(kind, outcome).inc();
  }

  trackDroppedSubscriber(reason: string): void {
    this.notificationsDropped.labels(reason).inc();
  }
}

export const metrics = new MetricsCollector();
