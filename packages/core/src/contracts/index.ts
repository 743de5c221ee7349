export * from './checkpoint';
export * from './channel';
export * from './serde';
