/**
 * Base provider exports
 */
export type { FirewallProvider } from './FirewallProvider.js';
