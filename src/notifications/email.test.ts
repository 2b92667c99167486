import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EmailScheduler } from './email';
import { createTestContext, every } from './testing';
import type { TestContext } from './testing';
import { GameWindow } from '../desktop/window';
import { createOutlook } from '../windows/mail';
import type { EmailTemplate } from '../content/types';

const budget: EmailTemplate = { sender: 'Dana Whitlock', subject: 'Budget sign-off needed', message: 'See attached.', responses: ['On it'] };
const lunch: EmailTemplate = { sender: 'Lena Park', subject: 'Lunch order', message: 'Tacos?', responses: ['Yes'] };
const praise: EmailTemplate = { sender: 'Marco Reyes', subject: 'Priya saved the day', message: 'Amazing work.', responses: ['Agreed'] };

function setup(random: () => number, regular: EmailTemplate[] = [budget]): { ctx: TestContext; scheduler: EmailScheduler } {
  const ctx = createTestContext({
    config: { email: { ...every(1_000), praiseChance: 0.3 } },
    documents: { 'emails.json': { regular, praise: [praise] } },
    random,
  });
  ctx.manager.spawn(new GameWindow({
    id: 'outlook',
    title: 'Outlook',
    rect: { x: 0, y: 0, width: 800, height: 600 },
    content: createOutlook(50),
  }));
  return { ctx, scheduler: new EmailScheduler(ctx.config.email, random) };
}

function inbox(ctx: TestContext) {
  const outlook = ctx.manager.get('outlook');
  return outlook && outlook.content.kind === 'outlook' ? outlook.content.emails : [];
}

describe('EmailScheduler', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should deliver an email to the inbox with a toast when the timer runs out', () => {
    const { ctx, scheduler } = setup(() => 0.5);

    expect(scheduler.tick(999, ctx)).toBeNull();
    const toast = scheduler.tick(1, ctx);

    expect(toast?.title).toBe('Outlook');
    expect(toast?.content).toEqual({
      kind: 'popup',
      popup: {
        type: 'toast',
        sequence: 1,
        heading: 'Dana Whitlock',
        body: 'Budget sign-off needed',
        target: { kind: 'email', emailId: 1 },
        remainingMs: 8_000,
      },
    });
    expect(inbox(ctx).map(email => email.subject)).toEqual(['Budget sign-off needed']);
    expect(ctx.played).toEqual(['notify']);
  });

  it('should flag urgent subjects', () => {
    const { ctx, scheduler } = setup(() => 0.5, [lunch, budget]);

    scheduler.tick(1_000, ctx);
    scheduler.tick(1_000, ctx);

    const flags = Object.fromEntries(inbox(ctx).map(email => [email.subject, email.urgent]));
    expect(flags).toEqual({ 'Lunch order': false, 'Budget sign-off needed': true });
  });

  it('should send praise when the roll is under the praise chance', () => {
    const { ctx, scheduler } = setup(() => 0.1);

    const event = scheduler.advance(1_000, ctx);

    expect(event?.entry).toEqual({ template: praise, praise: true });
  });

  it('should fire at most once per call however long the frame', () => {
    const { ctx, scheduler } = setup(() => 0.5);

    scheduler.tick(10_000, ctx);

    expect(inbox(ctx)).toHaveLength(1);
    expect(scheduler.remainingMs).toBe(1_000);
  });

  it('should fall back to a placeholder when there are no regular emails', () => {
    const { ctx, scheduler } = setup(() => 0.5, []);

    const event = scheduler.advance(1_000, ctx);

    expect(event?.exhausted).toBe(true);
    expect(event?.entry.template.sender).toBe('noreply@summitfund.org');
    expect(console.warn).toHaveBeenCalledWith('[Email] emails.regular exhausted, using placeholder');
  });

  it('should deliver queued praise ahead of the regular timer', () => {
    const { ctx, scheduler } = setup(() => 0.5);
    scheduler.queuePraise(500);

    expect(scheduler.tick(400, ctx)).toBeNull();
    expect(scheduler.tick(100, ctx)).not.toBeNull();

    expect(scheduler.queued).toBe(0);
    expect(inbox(ctx)[0]).toMatchObject({ sender: 'Marco Reyes', urgent: false });
    expect(scheduler.remainingMs).toBe(500);
  });

  it('should keep the regular timer running while queued praise goes out', () => {
    const { ctx, scheduler } = setup(() => 0.5);
    scheduler.queuePraise(1_000);

    scheduler.tick(1_000, ctx);
    expect(inbox(ctx).map(email => email.sender)).toEqual(['Marco Reyes']);
    expect(scheduler.remainingMs).toBe(0);

    scheduler.tick(0, ctx);
    expect(inbox(ctx).map(email => email.sender)).toEqual(['Dana Whitlock', 'Marco Reyes']);
    expect(scheduler.remainingMs).toBe(1_000);
  });

  it('should drop the email when no inbox is open', () => {
    const { ctx, scheduler } = setup(() => 0.5);
    ctx.manager.clear();

    expect(scheduler.tick(1_000, ctx)).toBeNull();
    expect(console.warn).toHaveBeenCalledWith('[Email] No inbox open, dropping email');
  });
});
