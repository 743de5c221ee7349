export * from './base';
export * from './ids';
export * from './metadata';
export * from './snapshot';
export * from './tuple';
