import { DepartmentAdapter } from './index';
import { IdentityAdapter } from '../identity_adapter';
import type { Principal } from '../identity_adapter';
import { MemoryPersistenceGateway } from '../../persistence/memory';
import {
  NotAuthenticatedError,
  PermissionDeniedError,
  RecordNotFoundError,
  ValidationError,
} from '../../errors';

describe('DepartmentAdapter', () => {
  let gateway: MemoryPersistenceGateway;
  let identity: IdentityAdapter;
  let departments: DepartmentAdapter;
  let adminA: Principal;
  let adminB: Principal;
  let user: Principal;
  let outsider: Principal;

  async function signUp(username: string, isAdmin: boolean): Promise<Principal> {
    await identity.registerPrincipal(username, 'test-secret', username.toUpperCase(), isAdmin);
    return identity.authenticate(username, 'test-secret');
  }

  beforeEach(async () => {
    gateway = new MemoryPersistenceGateway();
    identity = new IdentityAdapter({ gateway });
    departments = new DepartmentAdapter({ gateway });
    adminA = await signUp('admin-a', true);
    adminB = await signUp('admin-b', true);
    user = await signUp('user', false);
    outsider = await signUp('outsider', false);
  });

  describe('createDepartment', () => {
    it('should create a department headed by an admin', async () => {
      const departmentId = await departments.createDepartment(adminA, 'Finance', adminB.userId);

      expect(await departments.getDepartment(departmentId)).toEqual({
        id: departmentId,
        name: 'Finance',
        headId: adminB.userId,
      });
    });

    it('should refuse a non-admin head and persist nothing', async () => {
      const error = await departments.createDepartment(adminA, 'Finance', user.userId).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PermissionDeniedError);
      expect(error).toMatchObject({ action: 'department.create', reason: 'department head must be an admin' });
      expect(gateway.getCommitCount()).toBe(4);
    });

    it('should refuse a non-admin creator', async () => {
      await expect(departments.createDepartment(user, 'Finance', adminB.userId)).rejects.toThrow(
        'Permission denied for department.create on department:Finance: only administrators can create departments'
      );
    });

    it('should deny a non-admin without revealing whether the head exists', async () => {
      await expect(departments.createDepartment(user, 'Finance', 'missing-user')).rejects.toMatchObject({
        kind: 'PermissionDenied',
        reason: 'only administrators can create departments',
      });
    });

    it('should report a head that does not exist', async () => {
      await expect(departments.createDepartment(adminA, 'Finance', 'missing-user')).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it('should validate the name before touching storage', async () => {
      await expect(departments.createDepartment(adminA, '  ', adminB.userId)).rejects.toMatchObject({ field: 'name' });
    });

    it('should require a principal', async () => {
      await expect(departments.createDepartment(null, 'Finance', adminB.userId)).rejects.toBeInstanceOf(NotAuthenticatedError);
    });
  });

  describe('membership', () => {
    let departmentId: string;

    beforeEach(async () => {
      departmentId = await departments.createDepartment(adminA, 'Finance', adminB.userId);
    });

    it('should add and list members', async () => {
      await departments.addDepartmentMember(adminA, departmentId, user.userId);

      const members = await departments.listDepartmentMembers(user, departmentId);

      expect(members).toEqual([
        {
          id: user.userId,
          username: 'user',
          displayName: 'USER',
          isAdmin: false,
          email: null,
          notificationPreferences: { email: true, inApp: true },
        },
      ]);
    });

    it('should reject adding an existing member', async () => {
      await departments.addDepartmentMember(adminA, departmentId, user.userId);

      const error = await departments.addDepartmentMember(adminA, departmentId, user.userId).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'userId', reason: `is already a member of department ${departmentId}` });
    });

    it('should only let admins change membership', async () => {
      await expect(departments.addDepartmentMember(user, departmentId, outsider.userId)).rejects.toMatchObject({
        reason: 'only administrators can change department membership',
      });
    });

    it('should report unknown departments and users', async () => {
      await expect(departments.addDepartmentMember(adminA, 'missing', user.userId)).rejects.toMatchObject({
        entityKind: 'department',
        entityId: 'missing',
      });
      await expect(departments.addDepartmentMember(adminA, departmentId, 'missing')).rejects.toMatchObject({
        entityKind: 'user',
        entityId: 'missing',
      });
    });

    it('should deny non-admins before looking up the department', async () => {
      await expect(departments.addDepartmentMember(user, 'missing', outsider.userId)).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
      await expect(departments.removeDepartmentMember(user, 'missing', outsider.userId)).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
      await expect(departments.listDepartmentMembers(outsider, 'missing')).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(departments.listDepartmentMembers(adminA, 'missing')).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it('should remove a member', async () => {
      await departments.addDepartmentMember(adminA, departmentId, user.userId);

      await departments.removeDepartmentMember(adminA, departmentId, user.userId);

      expect(await departments.listDepartmentMembers(adminA, departmentId)).toEqual([]);
    });

    it('should report removing a user who is not a member', async () => {
      await expect(departments.removeDepartmentMember(adminA, departmentId, user.userId)).rejects.toMatchObject({
        entityKind: 'membership',
        entityId: `${departmentId}/${user.userId}`,
      });
    });

    it('should let the head list members but not an outsider', async () => {
      await departments.addDepartmentMember(adminA, departmentId, user.userId);

      expect(await departments.listDepartmentMembers(adminB, departmentId)).toHaveLength(1);
      await expect(departments.listDepartmentMembers(outsider, departmentId)).rejects.toBeInstanceOf(PermissionDeniedError);
    });
  });
});
