import type { TaskRecord } from "../record_types";
import { assertValidRecord } from "../record_validations";
import { generateRecordId } from "../utils/id_generator";

/**
 * Creates a new, fully-formed TaskRecord with validation.
 * New tasks start at status `new`, priority `normal` and version 1.
 */
export async function createTaskRecord(payload: Partial<TaskRecord>): Promise<TaskRecord> {
  const task: TaskRecord = {
    id: payload.id ?? generateRecordId(),
    title: payload.title?.trim() ?? '',
    description: payload.description ?? '',
    creatorId: payload.creatorId ?? '',
    assigneeId: payload.assigneeId ?? null,
    departmentId: payload.departmentId ?? null,
    createdAt: payload.createdAt ?? new Date().toISOString(),
    deadline: payload.deadline ?? null,
    status: payload.status ?? 'new',
    priority: payload.priority ?? 'normal',
    version: payload.version ?? 1,
  };

  return assertValidRecord("task_record_schema", task);
}
