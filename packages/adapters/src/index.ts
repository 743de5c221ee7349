export * from './checkpoint';
export * from './logger';
