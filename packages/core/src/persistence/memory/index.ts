export { MemoryPersistenceGateway } from './memory_gateway';
export type { MemoryPersistenceGatewayDependencies } from './memory_gateway';
