import type { ServerResponse } from 'http';
import type { ServerMetrics } from '../../metrics.js';
import { sendText } from '../response-helpers.js';

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export function handleMetrics(
  res: ServerResponse,
  metrics: ServerMetrics,
): void {
  sendText(res, metrics.render(), PROMETHEUS_CONTENT_TYPE);
}
