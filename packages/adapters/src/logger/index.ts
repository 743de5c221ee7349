export * from './pino';
export * from './fake';
