import type { DepartmentRecord } from '../../record_types';
import type { PersistenceGateway } from '../../persistence';
import type { Logger } from '../../logger';
import type { Principal, UserProfile } from '../identity_adapter';

/**
 * DepartmentAdapter Interface - departments and their membership
 */
export interface IDepartmentAdapter {
  createDepartment(principal: Principal | null, name: string, headId: string): Promise<string>;
  addDepartmentMember(principal: Principal | null, departmentId: string, userId: string): Promise<void>;
  removeDepartmentMember(principal: Principal | null, departmentId: string, userId: string): Promise<void>;
  getDepartment(departmentId: string): Promise<DepartmentRecord | null>;
  listDepartmentMembers(principal: Principal | null, departmentId: string): Promise<UserProfile[]>;
}

/**
 * DepartmentAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export type DepartmentAdapterDependencies = {
  gateway: PersistenceGateway;
  logger?: Logger;
};
