/**
 * Context module — the session store, its domains and snapshots.
 */

export * from './domains.js';
export * from './store.js';
export * from './snapshot.js';
