/**
 * Response envelopes and bodies of the HTTP API
 */
import { SaleCommit } from './sale.types';

export interface ApiSuccessResponse<T> {
  data: T;
  message?: string;
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

// POST /v1/sales: cents plus display strings
export interface SaleResponseBody extends SaleCommit {
  total: string;
  tendered: string;
  change: string;
}

export interface HealthCheckResponse {
  status: 'healthy';
  timestamp: string;
  storage: 'memory' | 'supabase';
  uptime: number;
}

export interface VersionInfo {
  version: string;
  api: string;
}
