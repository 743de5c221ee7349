export * from './memory';
export * from './sqlite';
export * from './postgres';
