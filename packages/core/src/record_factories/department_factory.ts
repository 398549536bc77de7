import type { DepartmentRecord } from "../record_types";
import { assertValidRecord } from "../record_validations";
import { generateRecordId } from "../utils/id_generator";

export async function createDepartmentRecord(payload: Partial<DepartmentRecord>): Promise<DepartmentRecord> {
  const department: DepartmentRecord = {
    id: payload.id ?? generateRecordId(),
    name: payload.name?.trim() ?? '',
    headId: payload.headId ?? '',
  };

  return assertValidRecord("department_record_schema", department);
}
