/**
 * Provider index - exports the version index clients
 */

export { BaseIndexClient } from './BaseIndexClient';
export { ChromiumIndexClient } from './ChromiumIndexClient';
export type { ChromiumIndexClientOptions } from './ChromiumIndexClient';
export { FirefoxIndexClient } from './FirefoxIndexClient';
export type { FirefoxIndexClientOptions } from './FirefoxIndexClient';
