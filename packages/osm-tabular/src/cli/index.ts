/**
 * CLI Module
 *
 * @module cli
 */

export * from './context.js';
export * from './lib/index.js';
export { executeProcess, registerProcessCommand, type ProcessOptions } from './commands/process/index.js';
export { executeAudit, registerAuditCommand, type AuditOptions } from './commands/audit/index.js';
