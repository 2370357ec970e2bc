export { MongoCounterStore } from './store';
export type { MongoCounterStoreConfig } from './store';
export { getCounterModel } from './schema';
export type { ICounterRow } from './schema';
export { isUnavailableError } from './errors';
