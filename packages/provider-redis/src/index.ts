export { RedisStateProvider } from './provider';
export type { RedisStateProviderConfig } from './provider';
