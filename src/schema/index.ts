/**
 * Database schema definitions for the framework_agreements schema
 */

export * from './_schema';

// Core tables
export * from './agreements';
export * from './pos';

// Bookkeeping
export * from './status-history';
export * from './sequences';
