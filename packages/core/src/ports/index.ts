export * from './logger';
export * from './postgres';
