import type { ProcessorConfig } from '../config.js';
import { GcsObjectStore } from './gcs-store.js';
import { LocalObjectStore } from './local-store.js';
import type { ObjectStore } from './object-store.js';

export type { ObjectStore } from './object-store.js';

export const createObjectStore = (config: Pick<ProcessorConfig, 'objectStore' | 'localStorageDir'>): ObjectStore =>
  config.objectStore === 'gcs' ? new GcsObjectStore() : new LocalObjectStore(config.localStorageDir);
