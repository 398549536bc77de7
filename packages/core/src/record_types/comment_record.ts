export interface CommentRecord {
  id: string;
  taskId: string;
  authorId: string;
  text: string;
  /** ISO 8601 timestamp */
  createdAt: string;
}
