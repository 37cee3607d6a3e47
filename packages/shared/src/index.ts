export { ConcurrentPool, type PoolOutcome } from './utils/concurrent-pool';
export {
  spawnAsync,
  SpawnTimeoutError,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
