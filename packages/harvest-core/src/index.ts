/**
 * @textharvest/core
 * Data model, errors, configuration and logging for textharvest
 */

// Types
export * from './types';

// Errors
export * from './error/harvest-error';

// Configuration
export * from './config/schema';
export * from './config/resolve';
export * from './config/extensions';

// Logging
export * from './logging/logger';

// Utils
export * from './utils/paths';

// Defaults
export * from './defaults';
