export * from './errors';
export * from './metrics';
export * from './store/key-value-store';
export * from './store/redis-store';
export * from './store/memory-store';
export * from './lock/distributed-lock';
export * from './cache/rate-cache';
export * from './providers/rate-provider.interface';
export * from './providers/frankfurter.client';
export * from './tasks/background-tasks';
export * from './repository/rate-repository';
export * from './refresh/rate-refresher';
export * from './service/rate-service';
