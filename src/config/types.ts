/**
 * Configuration types for the bead-array QC tools.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to run and server configuration.
 */

import type { LogLevel } from '../logging/logger.js';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  qc: QcConfig;
}

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3002) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

export type BlockStrategyName = 'auto' | 'fixed-count' | 'next-marker';

/**
 * Section markers and termination strategy for locating the
 * MFI and bead-count blocks.
 */
export interface BlockConfig {
  /** Termination strategy; 'auto' detects it from the export preamble */
  strategy: BlockStrategyName;
  /** Wells per block for 'fixed-count' */
  wellCount?: number;
  /** Substring marking the MFI section */
  mfiMarker: string;
  /** Regular expression source marking the bead-count section */
  countMarker: string;
  /** Substring that disqualifies a count-marker line */
  countExclude: string;
  /** Substrings that end a block under 'next-marker' */
  terminators: string[];
}

/**
 * QC run settings.
 */
export interface QcConfig {
  /** Bead counts strictly below this fail */
  beadThreshold: number;
  /** Standard curves with R² strictly above this pass */
  rSquaredThreshold: number;
  /** Analyte subtracted from every other analyte */
  backgroundAnalyte: string;
  /** Analytes evaluated for the standard curve */
  standardAnalytes: string[];
  /** Directory receiving QC artifacts */
  outputDir: string;
  /** Abort folder runs on the first unparseable file */
  strict: boolean;
  /** Extension of export files picked up in folder mode */
  fileExtension: string;
  /** Plates processed at once in folder mode */
  concurrency: number;
  blocks: BlockConfig;
}

/**
 * Default block location settings.
 */
export const DEFAULT_BLOCK_CONFIG: BlockConfig = {
  strategy: 'auto',
  mfiMarker: 'Median',
  countMarker: 'DataType.*Count',
  countExclude: 'Per Bead',
  terminators: ['Net MFI', 'Avg Net MFI', 'Total Events'],
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3002,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  qc: {
    beadThreshold: 50,
    rSquaredThreshold: 0.9,
    backgroundAnalyte: '',
    standardAnalytes: [],
    outputDir: './qc-output',
    strict: false,
    fileExtension: '.csv',
    concurrency: 4,
    blocks: DEFAULT_BLOCK_CONFIG,
  },
};
