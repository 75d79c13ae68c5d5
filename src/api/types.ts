/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 */

import type { GeneratedArtifact } from '../types/batch.js';
import type { LogLevel } from '../config/types.js';

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
// Protocol Endpoints
// ============================================================================

/**
 * Response for POST /protocols/preview.
 */
export interface PreviewResponse {
  iteration: number;
  experiments: number;
  relabeled: boolean;
  warnings: string[];
  /** Patched protocol text */
  text: string;
}

/**
 * Response for POST /protocols/generate.
 */
export interface GenerateResponse {
  success: true;
  artifact: GeneratedArtifact;
}

// ============================================================================
// Health
// ============================================================================

export interface HealthResponse {
  /** Status */
  status: 'ok' | 'degraded' | 'error';
  /** Timestamp */
  timestamp: string;
  components: {
    template: { path: string; marker: string };
  };
}

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * Per-instance overrides of the configured server settings.
 */
export interface ServerOptions {
  port?: number;
  host?: string;
  logLevel?: LogLevel;
}
