export { DepartmentAdapter } from './department_adapter';
export type { IDepartmentAdapter, DepartmentAdapterDependencies } from './department_adapter.types';
