/**
 * Configuration types for the protocol generator.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to generator and server settings.
 */

import { DEFAULT_TEMPLATE_OPTIONS, type TemplateOptions } from '../template/TemplatePatcher.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  generator: GeneratorConfig;
}

/**
 * HTTP server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  cors: CorsConfig;
}

export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Protocol generation settings.
 */
export interface GeneratorConfig {
  /** Base protocol template (default: './color_mixing.py') */
  templatePath: string;
  /** Where generated protocols are written; the template's directory when unset */
  outputDir?: string | undefined;
  /**
   * Regular expression whose first capture group is the iteration number
   * in a batch file name (default: 'BO_R(\d+)').
   */
  iterationPattern: string;
  template: TemplateOptions;
}

export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  generator: {
    templatePath: './color_mixing.py',
    iterationPattern: 'BO_R(\\d+)',
    template: { ...DEFAULT_TEMPLATE_OPTIONS },
  },
};
