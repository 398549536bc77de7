import type {
  CommentRecord,
  DepartmentMembershipRecord,
  DepartmentRecord,
  NotificationRecord,
  TaskRecord,
  UserRecord,
} from '../../record_types';

export function membershipKey(departmentId: string, userId: string): string {
  return `${departmentId}\u0000${userId}`;
}

/**
 * The whole in-memory database. Maps keep insertion order, which the
 * stores use as the tie-breaker between equal timestamps.
 */
export class MemoryState {
  users = new Map<string, UserRecord>();
  departments = new Map<string, DepartmentRecord>();
  memberships = new Map<string, DepartmentMembershipRecord>();
  tasks = new Map<string, TaskRecord>();
  comments = new Map<string, CommentRecord>();
  notifications = new Map<string, NotificationRecord>();

  clone(): MemoryState {
    const copy = new MemoryState();
    copy.users = structuredClone(this.users);
    copy.departments = structuredClone(this.departments);
    copy.memberships = structuredClone(this.memberships);
    copy.tasks = structuredClone(this.tasks);
    copy.comments = structuredClone(this.comments);
    copy.notifications = structuredClone(this.notifications);
    return copy;
  }
}

/**
 * A mutation. Writes check their preconditions before touching the state,
 * so a throwing write leaves the state unchanged.
 */
export type MemoryWrite = (state: MemoryState) => void;

export type MemoryAccess = {
  read(): MemoryState;
  write(op: MemoryWrite): void;
};
