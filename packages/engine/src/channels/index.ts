export * from './empty';
export * from './reducers';
export * from './untrackedValue';
export * from './lastValue';
export * from './reducerChannel';
export * from './registry';
export * from './scope';
