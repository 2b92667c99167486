export { Countdown, NotificationScheduler } from './scheduler';
export type {
  NotificationEvent,
  NotificationKind,
  EmailEvent,
  ChatEvent,
  PhoneEvent,
  InterruptEvent,
  ActivityEvent,
  MilestoneEvent,
  SchedulerContext,
  Ticking,
} from './scheduler';
export { EmailScheduler } from './email';
export { ChatScheduler } from './chat';
export { PhoneScheduler, isPhonePopup } from './phone';
export { DiscordInterruptScheduler, INTERRUPT_SENDER } from './discord';
export { ActivityScheduler } from './activity';
export { milestoneEvent, deliverMilestone } from './milestone';
export { spawnToast, stackToasts, isToast } from './toasts';
