import { describe, it, expect } from 'vitest';
import { addEmail, createOutlook, findEmail, markRead, markReplied, unreadCount } from './mail';
import { createActivityLog, logActivity, setProgress } from './activity-log';
import type { EmailTemplate } from '../content/types';

function template(subject: string): EmailTemplate {
  return { sender: 'Dana Whitlock', subject, message: 'Body text.', responses: ['Sure', 'Later'] };
}

describe('Outlook inbox', () => {
  it('should put new emails first with increasing ids', () => {
    const outlook = createOutlook(10);

    const first = addEmail(outlook, template('First'), '9:00 AM');
    const second = addEmail(outlook, template('Second'), '9:05 AM', true);

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(second.urgent).toBe(true);
    expect(outlook.emails.map(email => email.subject)).toEqual(['Second', 'First']);
  });

  it('should copy the responses from the template', () => {
    const outlook = createOutlook(10);
    const source = template('Copy');

    const email = addEmail(outlook, source, '9:00 AM');
    email.responses.push('Extra');

    expect(source.responses).toEqual(['Sure', 'Later']);
  });

  it('should drop the oldest emails past the limit', () => {
    const outlook = createOutlook(2);

    addEmail(outlook, template('One'), '9:00 AM');
    addEmail(outlook, template('Two'), '9:01 AM');
    addEmail(outlook, template('Three'), '9:02 AM');

    expect(outlook.emails.map(email => email.subject)).toEqual(['Three', 'Two']);
    expect(findEmail(outlook, 1)).toBeUndefined();
  });

  it('should track read and replied state', () => {
    const outlook = createOutlook(10);
    addEmail(outlook, template('One'), '9:00 AM');
    addEmail(outlook, template('Two'), '9:01 AM');

    expect(unreadCount(outlook)).toBe(2);
    expect(markRead(outlook, 1)).toBe(true);
    expect(markRead(outlook, 1)).toBe(false);
    expect(markReplied(outlook, 2)).toBe(true);
    expect(markReplied(outlook, 99)).toBe(false);

    expect(unreadCount(outlook)).toBe(0);
    expect(findEmail(outlook, 2)?.replied).toBe(true);
  });
});

describe('Activity log', () => {
  it('should keep the newest entries first up to the limit', () => {
    const log = createActivityLog(2, 100);

    logActivity(log, '9:00 AM', 'Priya booked the venue');
    logActivity(log, '9:01 AM', 'Priya called a sponsor');
    logActivity(log, '9:02 AM', 'Priya sent the invites');

    expect(log.entries.map(entry => entry.text)).toEqual(['Priya sent the invites', 'Priya called a sponsor']);
  });

  it('should report a change only when the whole percentage moves', () => {
    const log = createActivityLog(10, 100);

    expect(setProgress(log, 0.4)).toBe(false);
    expect(setProgress(log, 1.2)).toBe(true);
    expect(setProgress(log, 1.9)).toBe(false);
    expect(log.progress).toBe(1.9);
  });
});
