/**
 * Central export for all ingestion modules
 */

export * from './trends-client';
export * from './competitor-search';
