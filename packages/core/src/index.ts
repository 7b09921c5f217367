/**
 * ledger-agent core
 *
 * Client-side mining and confirmation auditing against a remote
 * proof-of-work ledger service.
 */

export * from './schemas/ledger.js';
export * from './mining/hash.js';
export * from './mining/block.js';
export * from './mining/pow.js';
export * from './services/ledger.js';
export * from './services/chain.js';
export * from './services/mining.js';
export * from './services/audit.js';
export { Config, AgentConfigSchema, type AgentConfig } from './agent/config.js';
export { Logger, type LogLevel, type LogSink, type LoggerOptions } from './agent/logger.js';
export { delay, describeError } from './util.js';
