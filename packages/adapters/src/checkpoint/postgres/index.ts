export * from './store';
export * from './pipeline';
export * from './sql';
export * from './codec';
