export interface DepartmentRecord {
  id: string;
  name: string;
  /** User id of the department head; must be an admin when the department is created */
  headId: string;
}

export interface DepartmentMembershipRecord {
  departmentId: string;
  userId: string;
}
