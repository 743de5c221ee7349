/**
 * Contracts, ports, configuration and errors shared by every Waypoint package.
 */
export * from './contracts';
export * from './contracts/schemas';
export * from './ports';
export * from './config';
export * from './errors';
export * from './utils';
