/**
 * Chat scheduler - a message arrives on Messages, Slack or Discord.
 */

import { receiveMessage } from '../windows/chat';
import { CHAT_TITLES } from '../windows/factory';
import type { ChatPlatform } from '../windows/types';
import type { GameWindow } from '../desktop/window';
import { pick } from '../random';
import type { Rng } from '../random';
import type { GameConfig } from '../config';
import { NotificationScheduler } from './scheduler';
import type { ChatEntry, ChatEvent, SchedulerContext } from './scheduler';
import { spawnToast } from './toasts';

const PLATFORMS: ChatPlatform[] = ['messages', 'slack', 'discord'];

export class ChatScheduler extends NotificationScheduler<ChatEvent> {
  readonly kind = 'chat';
  protected readonly tag = 'Chat';

  constructor(config: GameConfig['chat'], random: Rng) {
    super(config.interval, random);
  }

  protected fire(ctx: SchedulerContext): ChatEvent {
    const platform = pick(ctx.random, PLATFORMS) ?? 'messages';
    let entry: ChatEntry;
    let exhausted: boolean;

    if (platform === 'messages') {
      const draw = ctx.content.draw('chat.messages', 'shuffle', ctx.random);
      entry = { platform, thread: draw.entry.from, from: draw.entry.from, text: draw.entry.text };
      exhausted = draw.exhausted;
    } else {
      const draw = ctx.content.draw(platform === 'slack' ? 'chat.slack' : 'chat.discord', 'shuffle', ctx.random);
      entry = { platform, thread: draw.entry.channel, from: draw.entry.from, text: draw.entry.text };
      exhausted = draw.exhausted;
    }

    this.warnIfExhausted(exhausted, `chat.${platform}`);
    return { kind: 'chat', firedAtMs: this.elapsedMs, entry, exhausted };
  }

  deliver(event: ChatEvent, ctx: SchedulerContext): GameWindow | null {
    const { platform, thread, from, text } = event.entry;
    const chat = ctx.manager.get(platform);
    if (chat && (chat.content.kind === 'messages' || chat.content.kind === 'slack' || chat.content.kind === 'discord')) {
      receiveMessage(chat.content, thread, from, text);
      chat.touch();
    }

    const heading = platform === 'messages' ? from : `${from} in ${thread}`;
    return spawnToast(
      ctx,
      CHAT_TITLES[platform],
      heading,
      text,
      { kind: 'chat', platform, thread },
      ctx.config.chat.toastLifetimeMs,
    );
  }
}
