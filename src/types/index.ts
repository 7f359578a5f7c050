/**
 * Type definitions for browser-fetcher
 */

export * from './browser';
export * from './config';
