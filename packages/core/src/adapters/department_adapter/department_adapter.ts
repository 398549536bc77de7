import { assertAllowed } from '../../access_control';
import type { AccessContext } from '../../access_control';
import { RecordNotFoundError, ValidationError, toPersistenceFailure } from '../../errors';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { PersistenceGateway, PersistenceStores } from '../../persistence';
import { createDepartmentRecord } from '../../record_factories';
import type { DepartmentRecord } from '../../record_types';
import { requirePrincipal } from '../identity_adapter';
import type { Principal, UserProfile } from '../identity_adapter';
import type { DepartmentAdapterDependencies, IDepartmentAdapter } from './department_adapter.types';

/**
 * DepartmentAdapter - creates departments and manages who belongs to them.
 *
 * A department's head must hold the admin role when the department is
 * created. Membership changes are admin-only.
 */
export class DepartmentAdapter implements IDepartmentAdapter {
  private gateway: PersistenceGateway;
  private logger: Logger;

  constructor(dependencies: DepartmentAdapterDependencies) {
    this.gateway = dependencies.gateway;
    this.logger = dependencies.logger ?? createLogger('[Departments] ');
  }

  /**
   * @returns the new department id
   */
  async createDepartment(principal: Principal | null, name: string, headId: string): Promise<string> {
    const actor = requirePrincipal(principal);
    const department = await createDepartmentRecord({ name, headId });

    const resource = `department:${department.name}`;
    if (!actor.isAdmin) {
      // checked ahead of the head lookup
      assertAllowed(actor, 'department.create', {}, resource);
    }

    await this.run('createDepartment', async (stores) => {
      const head = await stores.users.get(headId);
      if (!head) {
        throw new RecordNotFoundError('user', headId);
      }
      assertAllowed(actor, 'department.create', { proposedHeadIsAdmin: head.isAdmin }, resource);
      await stores.departments.create(department);
    });

    this.logger.info(`Department ${department.name} (${department.id}) created by ${actor.username}, head ${headId}`);
    return department.id;
  }

  async addDepartmentMember(principal: Principal | null, departmentId: string, userId: string): Promise<void> {
    const actor = requirePrincipal(principal);

    await this.run('addDepartmentMember', async (stores) => {
      assertAllowed(actor, 'department.add_member', {}, `department:${departmentId}`);
      await this.loadDepartment(stores, departmentId);
      if (!(await stores.users.get(userId))) {
        throw new RecordNotFoundError('user', userId);
      }
      if (!(await stores.departments.addMember(departmentId, userId))) {
        throw new ValidationError('userId', `is already a member of department ${departmentId}`);
      }
    });

    this.logger.info(`User ${userId} added to department ${departmentId}`);
  }

  async removeDepartmentMember(principal: Principal | null, departmentId: string, userId: string): Promise<void> {
    const actor = requirePrincipal(principal);

    await this.run('removeDepartmentMember', async (stores) => {
      assertAllowed(actor, 'department.remove_member', {}, `department:${departmentId}`);
      await this.loadDepartment(stores, departmentId);
      if (!(await stores.departments.removeMember(departmentId, userId))) {
        throw new RecordNotFoundError('membership', `${departmentId}/${userId}`);
      }
    });

    this.logger.info(`User ${userId} removed from department ${departmentId}`);
  }

  async getDepartment(departmentId: string): Promise<DepartmentRecord | null> {
    try {
      return await this.gateway.stores.departments.get(departmentId);
    } catch (error) {
      throw toPersistenceFailure('getDepartment', error);
    }
  }

  /**
   * Members ordered as the store lists them. Visible to admins, the head
   * and the members themselves.
   */
  async listDepartmentMembers(principal: Principal | null, departmentId: string): Promise<UserProfile[]> {
    const actor = requirePrincipal(principal);
    const stores = this.gateway.stores;

    try {
      const department = await stores.departments.get(departmentId);
      assertAllowed(actor, 'department.view_tasks', await this.contextFor(stores, departmentId, department, actor), `department:${departmentId}`);
      if (!department) {
        throw new RecordNotFoundError('department', departmentId);
      }

      const members: UserProfile[] = [];
      for (const memberId of await stores.departments.listMembers(departmentId)) {
        const user = await stores.users.get(memberId);
        if (user) {
          const { secretHash: _secretHash, ...profile } = user;
          members.push(profile);
        }
      }
      return members;
    } catch (error) {
      throw toPersistenceFailure('listDepartmentMembers', error);
    }
  }

  private async run(operation: string, work: (stores: PersistenceStores) => Promise<void>): Promise<void> {
    try {
      await this.gateway.transaction(work);
    } catch (error) {
      throw toPersistenceFailure(operation, error);
    }
  }

  private async loadDepartment(stores: PersistenceStores, departmentId: string): Promise<DepartmentRecord> {
    const department = await stores.departments.get(departmentId);
    if (!department) {
      throw new RecordNotFoundError('department', departmentId);
    }
    return department;
  }

  /**
   * A missing department yields a context only an admin passes.
   */
  private async contextFor(
    stores: PersistenceStores,
    departmentId: string,
    department: DepartmentRecord | null,
    actor: Principal
  ): Promise<AccessContext> {
    return {
      departmentId,
      departmentHeadId: department ? department.headId : null,
      isDepartmentMember: department ? await stores.departments.isMember(departmentId, actor.userId) : false,
    };
  }
}
