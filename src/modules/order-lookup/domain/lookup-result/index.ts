export type { LookupFound, LookupNotFound, LookupResult } from './types';
