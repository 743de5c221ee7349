export * from './defaults';
export * from './schemas';
export * from './resolve';
