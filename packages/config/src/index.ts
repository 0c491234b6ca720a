/**
 * @account-link/config
 * Environment and tenant role configuration for the account link service
 */

export * from './environment.js';
export * from './base-config.js';
export * from './oauth-config.js';
export * from './platform-config.js';
export * from './storage-config.js';
export * from './tenant-config.js';
