/**
 * @sprite-tree/scene
 *
 * Hierarchical 2D sprite nodes: texture regions with local transforms, tint
 * and opacity, frame animation, and recursive draw traversal.
 */

// Scene graph
export * from './sprite/index.js';

// Math
export * from './math/index.js';

// Rendering
export * from './render/index.js';

// Errors
export * from './errors/index.js';

// Logging
export { logger, ALogger, formatLogLine, type LogContext, type LogLevel } from './utils/logging/index.js';

// Configuration
export { NODE_ENV, LOG_LEVEL, VERBOSE_MODE, isVerbose, isDebugLevel } from './config/env.js';
