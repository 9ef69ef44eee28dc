import { StorageDriver } from '../../config/app.config';

export interface HealthResponse {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;
  service: string;
  quoteAsset: string;     // unit every value is reported in
  storage: StorageDriver;
}
