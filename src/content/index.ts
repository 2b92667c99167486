export { ContentStore, fetchJson } from './content-store';
export { PLACEHOLDERS } from './defaults';
export type * from './types';
