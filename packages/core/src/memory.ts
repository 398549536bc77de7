/**
 * In-memory implementations (no database, SMTP relay or filesystem required)
 *
 * Suitable for tests and single-process demos.
 */

// PersistenceGateway
export { MemoryPersistenceGateway } from './persistence/memory';
export type { MemoryPersistenceGatewayDependencies } from './persistence/memory';

// MailTransport
export { MemoryMailTransport } from './mail/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';
