export * from './asyncLock';
export * from './offload';
