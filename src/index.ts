/**
 * bead-array-qc: extraction and quality control for bead-array
 * immunoassay plate exports.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/index.js';

// Configuration
export * from './config/types.js';
export * from './config/loader.js';

// Logging
export * from './logging/logger.js';

// Export parsing
export * from './parsing/types.js';
export * from './parsing/csvCommon.js';
export * from './parsing/ExportDocument.js';
export * from './parsing/BlockLocator.js';
export * from './parsing/TableExtractor.js';

// QC stages
export * from './qc/errors.js';
export * from './qc/regression.js';
export * from './qc/AlignmentValidator.js';
export * from './qc/BeadCountQC.js';
export * from './qc/BackgroundSubtractor.js';
export * from './qc/StandardCurveFitter.js';
export * from './qc/PlateQCDecision.js';

// Pipeline
export * from './pipeline/ArtifactWriter.js';
export * from './pipeline/PlateProcessor.js';
export * from './pipeline/ProjectAggregator.js';
export * from './pipeline/runQc.js';

// HTTP API
export * from './api/types.js';
export * from './api/schemas.js';
export * from './api/handlers/index.js';
export { registerRoutes } from './api/routes.js';
export type { RouteOptions } from './api/routes.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, InitializeOptions } from './server.js';
