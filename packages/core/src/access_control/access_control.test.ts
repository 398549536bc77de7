import { PermissionDeniedError } from '../errors';
import { assertAllowed, evaluate } from './access_control';
import type { AccessAction, AccessContext, AccessSubject } from './access_control.types';

const PRINCIPAL_ID = 'principal';
const OTHER_ID = 'someone-else';

type Facts = {
  isAdmin: boolean;
  hasDepartment: boolean;
  isCreator: boolean;
  isAssignee: boolean;
  isHead: boolean;
  isMember: boolean;
};

function allFacts(): Facts[] {
  const combos: Facts[] = [];
  for (let bits = 0; bits < 64; bits++) {
    combos.push({
      isAdmin: (bits & 1) !== 0,
      hasDepartment: (bits & 2) !== 0,
      isCreator: (bits & 4) !== 0,
      isAssignee: (bits & 8) !== 0,
      isHead: (bits & 16) !== 0,
      isMember: (bits & 32) !== 0,
    });
  }
  return combos;
}

function toSubject(facts: Facts): AccessSubject {
  return { userId: PRINCIPAL_ID, isAdmin: facts.isAdmin };
}

function toContext(facts: Facts): AccessContext {
  return {
    creatorId: facts.isCreator ? PRINCIPAL_ID : OTHER_ID,
    assigneeId: facts.isAssignee ? PRINCIPAL_ID : null,
    departmentId: facts.hasDepartment ? 'dept-1' : null,
    departmentHeadId: facts.hasDepartment ? (facts.isHead ? PRINCIPAL_ID : OTHER_ID) : null,
    isDepartmentMember: facts.hasDepartment && facts.isMember,
    taskExists: true,
  };
}

function describeFacts(facts: Facts): string {
  return Object.entries(facts)
    .filter(([, value]) => value)
    .map(([key]) => key)
    .join(',') || 'none';
}

describe('evaluate', () => {
  describe('task rules over every role and relationship combination', () => {
    const expectations: Array<[AccessAction, (facts: Facts) => boolean]> = [
      ['task.create', (f) => !f.hasDepartment || f.isAdmin || (f.hasDepartment && f.isHead)],
      ['task.assign', (f) => f.isAdmin || f.isCreator || (f.hasDepartment && f.isHead)],
      ['task.change_status', (f) => f.isAdmin || f.isCreator || f.isAssignee || (f.hasDepartment && f.isHead)],
      ['task.comment', () => true],
      [
        'task.view_comments',
        (f) => f.isAdmin || f.isCreator || f.isAssignee || (f.hasDepartment && (f.isHead || f.isMember)),
      ],
      ['task.view', (f) => f.isAdmin || f.isCreator || f.isAssignee || (f.hasDepartment && (f.isHead || f.isMember))],
      ['department.view_tasks', (f) => f.isAdmin || (f.hasDepartment && (f.isHead || f.isMember))],
    ];

    it.each(expectations)('%s matches the rule table', (action, expected) => {
      const mismatches = allFacts()
        .filter((facts) => evaluate(toSubject(facts), action, toContext(facts)).allowed !== expected(facts))
        .map(describeFacts);

      expect(mismatches).toEqual([]);
    });
  });

  describe('department administration', () => {
    it('should allow an admin to create a department headed by an admin', () => {
      expect(evaluate({ userId: 'a', isAdmin: true }, 'department.create', { proposedHeadIsAdmin: true })).toEqual({
        allowed: true,
        rule: 'admin-creates-department-with-admin-head',
      });
    });

    it('should deny a non-admin head with a specific reason', () => {
      expect(evaluate({ userId: 'a', isAdmin: true }, 'department.create', { proposedHeadIsAdmin: false })).toEqual({
        allowed: false,
        reason: 'department head must be an admin',
      });
    });

    it('should deny department creation to non-admins', () => {
      expect(evaluate({ userId: 'u', isAdmin: false }, 'department.create', { proposedHeadIsAdmin: true })).toEqual({
        allowed: false,
        reason: 'only administrators can create departments',
      });
    });

    it.each(['department.add_member', 'department.remove_member'] as const)('should restrict %s to admins', (action) => {
      expect(evaluate({ userId: 'a', isAdmin: true }, action).allowed).toBe(true);
      expect(evaluate({ userId: 'u', isAdmin: false }, action, { departmentHeadId: 'u', departmentId: 'd' }).allowed).toBe(
        false
      );
    });
  });

  describe('user data', () => {
    it.each(['user.view_tasks', 'user.view_statistics'] as const)('%s is allowed for self or admin only', (action) => {
      expect(evaluate({ userId: 'u', isAdmin: false }, action, { subjectUserId: 'u' })).toEqual({ allowed: true, rule: 'self' });
      expect(evaluate({ userId: 'a', isAdmin: true }, action, { subjectUserId: 'u' })).toEqual({ allowed: true, rule: 'admin' });
      expect(evaluate({ userId: 'v', isAdmin: false }, action, { subjectUserId: 'u' })).toEqual({
        allowed: false,
        reason: "only administrators can view another user's data",
      });
    });
  });

  it('should report the first matching rule', () => {
    const subject = { userId: 'u', isAdmin: true };
    expect(evaluate(subject, 'task.assign', { creatorId: 'u' })).toEqual({ allowed: true, rule: 'admin' });
    expect(evaluate({ userId: 'u', isAdmin: false }, 'task.assign', { creatorId: 'u' })).toEqual({
      allowed: true,
      rule: 'task-creator',
    });
  });

  it('should not treat a head id as headship without a department', () => {
    expect(evaluate({ userId: 'u', isAdmin: false }, 'task.assign', { departmentHeadId: 'u', creatorId: 'x' }).allowed).toBe(
      false
    );
  });

  it('should deny commenting on a task that does not exist', () => {
    expect(evaluate({ userId: 'u', isAdmin: false }, 'task.comment', { taskExists: false })).toEqual({
      allowed: false,
      reason: 'task does not exist',
    });
  });
});

describe('assertAllowed', () => {
  it('should throw PermissionDeniedError carrying the action, resource and reason', () => {
    expect(() =>
      assertAllowed({ userId: 'u3', isAdmin: false }, 'task.view_comments', { creatorId: 'u1' }, 'task:t-1')
    ).toThrow(
      new PermissionDeniedError(
        'task.view_comments',
        'task:t-1',
        'requires admin, task creator, task assignee, department head or department membership'
      )
    );
  });

  it('should return quietly on Allow', () => {
    expect(() => assertAllowed({ userId: 'u', isAdmin: false }, 'task.create', {}, 'task:new')).not.toThrow();
  });
});
