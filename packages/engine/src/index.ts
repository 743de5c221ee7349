/**
 * Channels, serialization, versioning and the base checkpoint store.
 */
export * from './serde';
export * from './channels';
export * from './versioning';
export * from './checkpoint';
export * from './utils';
