import type { TaskStatus } from '../../record_types';

/**
 * What one recipient gets for one event: the in-app message and the email.
 */
export type NotificationContent = {
  message: string;
  subject: string;
  html: string;
};

const STATUS_LABELS: Record<TaskStatus, string> = {
  'new': 'was reset to new',
  'in-progress': 'was taken into work',
  'completed': 'was completed',
  'cancelled': 'was cancelled',
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function emailBody(heading: string, fields: Array<[label: string, value: string]>): string {
  return [
    '<html>',
    '<body>',
    `<h2>${heading}</h2>`,
    ...fields.map(([label, value]) => `<p><strong>${label}:</strong> ${escapeHtml(value)}</p>`),
    '<p>Please sign in to view the task details.</p>',
    '</body>',
    '</html>',
  ].join('\n');
}

export function assignmentContent(taskTitle: string, creatorName: string): NotificationContent {
  return {
    message: `You have been assigned a new task: ${taskTitle} from ${creatorName}`,
    subject: 'New task assigned',
    html: emailBody('You have been assigned a new task', [
      ['Title', taskTitle],
      ['From', creatorName],
    ]),
  };
}

export function statusChangeContent(taskTitle: string, newStatus: TaskStatus): NotificationContent {
  return {
    message: `Task '${taskTitle}' ${STATUS_LABELS[newStatus]}`,
    subject: `Task status changed: ${taskTitle}`,
    html: emailBody('Task status changed', [
      ['Task', taskTitle],
      ['New status', newStatus],
    ]),
  };
}

export function commentContent(taskTitle: string, commenterName: string, text: string): NotificationContent {
  return {
    message: `New comment from ${commenterName} on task '${taskTitle}'`,
    subject: `New comment on task: ${taskTitle}`,
    html: emailBody('New comment on task', [
      ['Task', taskTitle],
      ['From', commenterName],
      ['Comment', text],
    ]),
  };
}
