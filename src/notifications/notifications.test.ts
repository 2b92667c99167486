import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ActivityScheduler } from './activity';
import { ChatScheduler } from './chat';
import { DiscordInterruptScheduler } from './discord';
import { EmailScheduler } from './email';
import { deliverMilestone, milestoneEvent } from './milestone';
import { isPhonePopup, PhoneScheduler } from './phone';
import { spawnToast, stackToasts } from './toasts';
import { createTestContext, every } from './testing';
import { createDesktopWindows, createToastWindow } from '../windows/factory';
import type { TestContext } from './testing';

const chatter = {
  messages: [{ from: 'Marco', text: 'Lunch?' }],
  slack: [{ channel: '# conference-planning', from: 'Omar', text: 'Venue confirmed' }],
  discord: [{ channel: '# general', from: 'Lena', text: 'gg' }],
  interrupts: ['quick question', 'are you around?'],
  activities: ['Priya booked the venue'],
  milestones: [{ threshold: 25, text: 'A quarter of the way there' }],
};

const calls = {
  callers: [{ name: 'Lena Park', number: '555-0123', turns: [{ speaker: 'caller', text: 'Hi' }] }],
};

function setup(random: () => number = () => 0): TestContext {
  const ctx = createTestContext({
    config: {
      chat: every(1_000),
      phone: every(1_000),
      interrupt: every(1_000),
      activity: every(1_000),
    },
    documents: { 'chatter.json': chatter, 'phone_calls.json': calls },
    random,
  });
  for (const win of createDesktopWindows({ screen: ctx.config.screen, inboxLimit: 50, logLimit: 30, progressMax: 100 })) {
    ctx.manager.spawn(win);
  }
  return ctx;
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ChatScheduler', () => {
  it('should deliver a direct message into its own thread', () => {
    const ctx = setup(() => 0);
    const scheduler = new ChatScheduler(ctx.config.chat, ctx.random);

    const toast = scheduler.tick(1_000, ctx);

    expect(toast?.title).toBe('Messages');
    expect(toast?.content).toMatchObject({
      popup: { heading: 'Marco', body: 'Lunch?', target: { kind: 'chat', platform: 'messages', thread: 'Marco' } },
    });
    const messages = ctx.manager.get('messages');
    expect(messages?.content).toMatchObject({ threads: [{ name: 'Marco', unread: 1 }] });
  });

  it('should name the channel for Slack messages', () => {
    const ctx = setup(() => 0.4);
    const scheduler = new ChatScheduler(ctx.config.chat, ctx.random);

    const toast = scheduler.tick(1_000, ctx);

    expect(toast?.title).toBe('Slack');
    expect(toast?.content).toMatchObject({ popup: { heading: 'Omar in # conference-planning', body: 'Venue confirmed' } });
    const slack = ctx.manager.get('slack');
    expect(slack?.content).toMatchObject({ threads: [{ name: '# general', unread: 0 }, { name: '# conference-planning', unread: 1 }] });
  });
});

describe('PhoneScheduler', () => {
  it('should ring with the next caller', () => {
    const ctx = setup();
    const scheduler = new PhoneScheduler(ctx.config.phone, ctx.random);

    const popup = scheduler.tick(1_000, ctx);

    expect(popup?.title).toBe('Phone');
    expect(popup?.content).toMatchObject({ popup: { type: 'phone', call: { state: 'ringing', caller: { name: 'Lena Park' }, remainingMs: 15_000 } } });
    expect(ctx.played).toEqual(['ring']);
  });

  it('should skip a call while the line is busy', () => {
    const ctx = setup();
    const scheduler = new PhoneScheduler(ctx.config.phone, ctx.random);
    const first = scheduler.tick(1_000, ctx);

    expect(scheduler.tick(1_000, ctx)).toBeNull();
    expect(ctx.manager.windows().filter(isPhonePopup)).toHaveLength(1);
    expect(console.log).toHaveBeenCalledWith('[Phone] Line busy, skipping call');
    expect(scheduler.remainingMs).toBe(1_000);

    if (first) ctx.manager.close(first.id);
    expect(scheduler.tick(1_000, ctx)).not.toBeNull();
  });
});

describe('DiscordInterruptScheduler', () => {
  it('should open a modal from Priya', () => {
    const ctx = setup();
    const scheduler = new DiscordInterruptScheduler(ctx.config.interrupt, ctx.random);

    const popup = scheduler.tick(1_000, ctx);

    expect(popup?.modal).toBe(true);
    expect(popup?.content).toEqual({ kind: 'popup', popup: { type: 'interrupt', from: 'Priya', text: 'quick question' } });
    expect(ctx.manager.focusedId()).toBe(popup?.id);
    expect(ctx.played).toEqual(['discord']);
  });

  it('should hold its timer while an interruption is open', () => {
    const ctx = setup();
    const scheduler = new DiscordInterruptScheduler(ctx.config.interrupt, ctx.random);
    const popup = scheduler.tick(1_000, ctx);

    expect(scheduler.tick(60_000, ctx)).toBeNull();
    expect(scheduler.remainingMs).toBe(1_000);

    if (popup) ctx.manager.close(popup.id);
    expect(scheduler.tick(999, ctx)).toBeNull();
    expect(scheduler.tick(1, ctx)).not.toBeNull();
  });
});

describe('ActivityScheduler', () => {
  it('should credit Priya, log the activity and queue praise', () => {
    const ctx = setup();
    const email = new EmailScheduler(ctx.config.email, ctx.random);
    const scheduler = new ActivityScheduler(ctx.config.activity, ctx.random, email);

    expect(scheduler.tick(1_000, ctx)).toBeNull();

    expect(ctx.state.progress.value).toBe(5);
    expect(ctx.state.stats.coworkerWork).toBe(5);
    expect(email.queued).toBe(1);
    const log = ctx.manager.get('activity-log');
    expect(log?.content).toMatchObject({
      progress: 5,
      entries: [{ time: '9:00 AM', text: 'Priya booked the venue' }],
    });
  });
});

describe('milestones', () => {
  it('should show the milestone text in a banner', () => {
    const ctx = setup();

    const popup = deliverMilestone(milestoneEvent(25, 0, ctx), ctx);

    expect(popup.rect).toEqual({ x: 720, y: 120, width: 480, height: 110 });
    expect(popup.content).toEqual({
      kind: 'popup',
      popup: { type: 'milestone', threshold: 25, text: 'A quarter of the way there', remainingMs: 3_000 },
    });
  });

  it('should stack banners for thresholds crossed together', () => {
    const ctx = setup();

    const first = deliverMilestone(milestoneEvent(25, 0, ctx), ctx);
    const second = deliverMilestone(milestoneEvent(50, 0, ctx), ctx);
    expect([first.rect.y, second.rect.y]).toEqual([120, 240]);

    ctx.manager.close(first.id);
    const third = deliverMilestone(milestoneEvent(75, 0, ctx), ctx);
    expect(third.rect.y).toBe(120);
  });

  it('should use a generic line for thresholds without text', () => {
    const ctx = setup();

    expect(milestoneEvent(50, 0, ctx).entry.text).toBe('50% Complete!');
  });
});

describe('stackToasts', () => {
  it('should stack toasts up from the bottom-right corner, newest lowest', () => {
    const ctx = setup();
    const target = { kind: 'email', emailId: 1 } as const;
    const toasts = [1, 2, 3].map(n => spawnToast(ctx, 'Outlook', `Sender ${n}`, 'Subject', target, 5_000));

    stackToasts(ctx.manager, ctx.config.screen);

    expect(toasts.map(toast => toast.id)).toEqual(['toast-1', 'toast-2', 'toast-3']);
    expect(toasts.map(toast => toast.rect.x)).toEqual([1540, 1540, 1540]);
    expect(toasts.map(toast => toast.rect.y)).toEqual([710, 830, 950]);
  });

  it('should order toasts by spawn sequence rather than id', () => {
    const ctx = setup();
    const target = { kind: 'email', emailId: 1 } as const;
    const late = createToastWindow('toast-late', 2, 'Outlook', 'Late', 'Subject', target, 5_000);
    const early = createToastWindow('toast-early', 1, 'Outlook', 'Early', 'Subject', target, 5_000);
    ctx.manager.spawn(late);
    ctx.manager.spawn(early);

    stackToasts(ctx.manager, ctx.config.screen);

    expect([early.rect.y, late.rect.y]).toEqual([830, 950]);
  });

  it('should place a new toast below those still open', () => {
    const ctx = setup();
    const target = { kind: 'email', emailId: 1 } as const;
    const [first, second] = [1, 2].map(n => spawnToast(ctx, 'Outlook', `Sender ${n}`, 'Subject', target, 5_000));
    ctx.manager.close(first.id);
    const third = spawnToast(ctx, 'Outlook', 'Sender 3', 'Subject', target, 5_000);

    stackToasts(ctx.manager, ctx.config.screen);

    expect([second.rect.y, third.rect.y]).toEqual([830, 950]);
  });
});
