import type { JsonObject } from './types.js';

export type NamespaceChange =
  | { kind: 'PATH_CHANGED'; path: string; attributes: JsonObject }
  | { kind: 'PATH_ADDED'; path: string }
  | { kind: 'PATH_REMOVED'; path: string };

/** Receives committed changes from the mutation coordinator. Must not block. */
export interface ChangeSink {
  notify(change: NamespaceChange): void;
}
