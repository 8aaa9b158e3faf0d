import { livenessNode } from '../status/schemas.js';
import type { LivenessReport } from '../types/index.js';
import { fetchJson } from './http.js';

export class PingClient {
  async ping(endpointUrl: string): Promise<LivenessReport> {
    return fetchJson(endpointUrl, livenessNode, { label: 'ping response' });
  }
}
