/**
 * Types for the HTTP API layer.
 */

import type { LogLevel } from '../logging/logger.js';
import type { AnalyteFit, LowBeadRecord, PlateQCResult, ProjectSummary } from '../types/qc.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// QC Endpoints
// ============================================================================

/**
 * Response of a single-plate QC run.
 */
export interface PlateQcResponse {
  plate: PlateQCResult;
  fits: AnalyteFit[];
  lowBead: LowBeadRecord[];
  /** Block termination strategy used */
  strategy: string;
  /** Cleaned table as CSV text */
  cleanedCsv: string;
  /** Paths written when `write` was requested */
  artifacts?: string[];
}

export interface ProjectQcResponse {
  summary: ProjectSummary;
}

// ============================================================================
// Health Check
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  /** Status */
  status: 'ok' | 'degraded' | 'error';
  /** Timestamp */
  timestamp: string;
  /** Component statuses */
  components?: {
    qc?: { configured: boolean; backgroundAnalyte: string; standardAnalytes: number };
  };
}

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * Server options.
 */
export interface ServerOptions {
  /** HTTP port (default: 3002) */
  port?: number;
  /** HTTP host (default: '0.0.0.0') */
  host?: string;
  /** Enable CORS (default: true) */
  cors?: boolean;
  /** Allowed CORS origins (default: all) */
  origins?: string[];
  /** Log level (default: 'info') */
  logLevel?: LogLevel;
}
