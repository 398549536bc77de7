import type { CommentRecord } from "../record_types";
import { assertValidRecord } from "../record_validations";
import { generateRecordId } from "../utils/id_generator";

export async function createCommentRecord(payload: Partial<CommentRecord>): Promise<CommentRecord> {
  const comment: CommentRecord = {
    id: payload.id ?? generateRecordId(),
    taskId: payload.taskId ?? '',
    authorId: payload.authorId ?? '',
    text: payload.text ?? '',
    createdAt: payload.createdAt ?? new Date().toISOString(),
  };

  return assertValidRecord("comment_record_schema", comment);
}
