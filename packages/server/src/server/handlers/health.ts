import type { ServerResponse } from 'http';
import { sendJson } from '../response-helpers.js';

export interface ServiceInfo {
  serviceName: string;
  version: string;
}

export function handleHealth(res: ServerResponse, info: ServiceInfo): void {
  sendJson(res, {
    service_name: info.serviceName,
    version: info.version,
    status: 'healthy',
  });
}
