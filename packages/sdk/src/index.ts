export { HitClient } from './client';
export type { HitClientConfig, StreamProducer } from './client';
