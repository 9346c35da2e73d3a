/**
 * Trading session — a session context layer for agents driving a trading
 * platform's REST API.
 *
 * Identifiers returned by one call (project, compile, backtest, ...) are
 * harvested into a per-session store and used to complete the arguments
 * of the next call. Long-running operations are polled to completion.
 */

export * from './schemas/index.js';
export * from './context/index.js';
export * from './harvest/harvester.js';
export * from './resolve/resolver.js';
export * from './resolve/failures.js';
export * from './reset/policy.js';
export * from './supervisor/supervisor.js';
export * from './supervisor/backoff.js';
export * from './supervisor/status.js';
export * from './registry/catalog.js';
export * from './transport/invoker.js';
export * from './transport/client.js';
export * from './orchestrator/session.js';
export * from './config/manager.js';
export * from './events/index.js';
export * from './logging/console.js';
export * from './tools/index.js';
export * from './mcp/index.js';
export { SERVER_NAME, SERVER_VERSION } from './version.js';
