/**
 * Outlook inbox - newest first, capped at a fixed number of emails.
 */

import type { EmailTemplate } from '../content/types';
import type { Email, OutlookContent } from './types';

export function createOutlook(limit: number): OutlookContent {
  return { kind: 'outlook', emails: [], limit, nextId: 1 };
}

export function addEmail(outlook: OutlookContent, template: EmailTemplate, time: string, urgent = false): Email {
  const email: Email = {
    id: outlook.nextId++,
    sender: template.sender,
    subject: template.subject,
    message: template.message,
    responses: [...template.responses],
    time,
    read: false,
    replied: false,
    urgent,
  };
  outlook.emails.unshift(email);
  if (outlook.emails.length > outlook.limit) {
    outlook.emails.length = outlook.limit;
  }
  return email;
}

export function findEmail(outlook: OutlookContent, id: number): Email | undefined {
  return outlook.emails.find(email => email.id === id);
}

export function markRead(outlook: OutlookContent, id: number): boolean {
  const email = findEmail(outlook, id);
  if (!email || email.read) return false;
  email.read = true;
  return true;
}

export function markReplied(outlook: OutlookContent, id: number): boolean {
  const email = findEmail(outlook, id);
  if (!email) return false;
  email.read = true;
  email.replied = true;
  return true;
}

export function unreadCount(outlook: OutlookContent): number {
  return outlook.emails.filter(email => !email.read).length;
}
