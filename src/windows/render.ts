/**
 * Content templates - one per window kind. Interactive elements carry
 * `data-action` (and `data-arg`) so the input layer can tell the game what
 * was clicked.
 */

import { escapeHtml } from '../desktop/html';
import { selectedThread, totalUnread } from './chat';
import { isComplete, visibleText } from './drafts';
import { CHAT_TITLES } from './factory';
import { ZOMBOID_SCENES } from './items';
import { unreadCount } from './mail';
import type {
  ActivityLogContent,
  ChatContent,
  EmailViewContent,
  FtlContent,
  InventoryContent,
  Item,
  OutlookContent,
  PhoneCall,
  Popup,
  ReplyContent,
  WindowContent,
  ZomboidContent,
} from './types';

function itemSlot(item: Item | undefined): string {
  if (!item) return '<div class="slot"></div>';
  return `
    <div class="slot">
      <div class="item" data-action="item" data-arg="${escapeHtml(item.id)}" title="${escapeHtml(item.name)}">
        <span class="item-icon">${escapeHtml(item.icon)}</span>
        <span class="item-name">${escapeHtml(item.name)}</span>
      </div>
    </div>`;
}

function slots(items: readonly Item[], capacity: number): string {
  return Array.from({ length: capacity }, (_, i) => itemSlot(items[i])).join('');
}

function renderInventory(content: InventoryContent): string {
  return `
    <div class="item-grid" style="grid-template-columns:repeat(${content.columns}, 1fr)">
      ${slots(content.items, content.capacity)}
    </div>
    <div class="item-footer">${content.items.length} / ${content.capacity}</div>`;
}

function renderFtl(content: FtlContent): string {
  return `
    <div class="ftl-hull">
      <div class="ftl-status">HULL 30 &middot; FUEL 12 &middot; SCRAP 85</div>
      <div class="cargo-hold">${slots(content.items, content.capacity)}</div>
    </div>`;
}

function renderZomboid(content: ZomboidContent): string {
  return `
    <div class="zomboid-scene">${escapeHtml(ZOMBOID_SCENES[content.scene] ?? '')}</div>
    <div class="backpack">${slots(content.items, content.capacity)}</div>`;
}

function renderOutlook(content: OutlookContent): string {
  const rows = content.emails.map(email => {
    const classes = ['email-row'];
    if (!email.read) classes.push('unread');
    if (email.urgent) classes.push('urgent');
    if (email.replied) classes.push('replied');
    return `
      <div class="${classes.join(' ')}" data-action="open-email" data-arg="${email.id}">
        <span class="email-sender">${escapeHtml(email.sender)}</span>
        <span class="email-subject">${escapeHtml(email.subject)}</span>
        <span class="email-time">${escapeHtml(email.time)}</span>
      </div>`;
  }).join('');

  return `
    <div class="outlook-header">Inbox (${unreadCount(content)})</div>
    <div class="email-list">${rows || '<div class="empty">No messages</div>'}</div>`;
}

function renderEmailView(content: EmailViewContent): string {
  const email = content.email;
  const responses = email.responses.map((response, i) =>
    `<button class="response-btn" data-action="respond" data-arg="${i}">${escapeHtml(response)}</button>`
  ).join('');

  return `
    <div class="email-meta">
      <div><b>From:</b> ${escapeHtml(email.sender)}</div>
      <div><b>Subject:</b> ${escapeHtml(email.subject)}</div>
    </div>
    <div class="email-body">${escapeHtml(email.message)}</div>
    <div class="email-responses">${responses}</div>`;
}

function renderReply(content: ReplyContent): string {
  const complete = isComplete(content.draft);
  return `
    <div class="email-meta">
      <div><b>To:</b> ${escapeHtml(content.to)}</div>
      <div><b>Subject:</b> Re: ${escapeHtml(content.subject)}</div>
    </div>
    <div class="draft">${escapeHtml(visibleText(content.draft))}<span class="caret"></span></div>
    <div class="draft-hint">${complete ? 'Ready to send' : 'Type to write your reply'}</div>
    <button class="send-btn${complete ? '' : ' disabled'}" data-action="send">Send</button>`;
}

function renderCompose(content: ChatContent): string {
  const compose = content.compose;
  if (!selectedThread(content)) return '';

  switch (compose.step) {
    case 'idle':
      return '<button class="reply-btn" data-action="compose">Reply</button>';
    case 'choosing':
      return compose.options.map((option, i) =>
        `<button class="option-btn" data-action="choose" data-arg="${i}">${escapeHtml(option)}</button>`
      ).join('');
    case 'typing': {
      const complete = isComplete(compose.draft);
      return `
        <div class="draft">${escapeHtml(visibleText(compose.draft))}<span class="caret"></span></div>
        <button class="send-btn${complete ? '' : ' disabled'}" data-action="send">Send</button>`;
    }
  }
}

function renderChat(content: ChatContent): string {
  const threads = content.threads.map((thread, i) => `
    <div class="thread${i === content.selected ? ' selected' : ''}" data-action="select-thread" data-arg="${i}">
      <span class="thread-name">${escapeHtml(thread.name)}</span>
      ${thread.unread > 0 ? `<span class="badge">${thread.unread}</span>` : ''}
    </div>`).join('');

  const thread = selectedThread(content);
  const messages = thread
    ? thread.messages.map(msg => `
        <div class="chat-message${msg.mine ? ' mine' : ''}">
          <span class="chat-from">${escapeHtml(msg.from)}</span>
          <span class="chat-text">${escapeHtml(msg.text)}</span>
        </div>`).join('')
    : `<div class="empty">${totalUnread(content)} unread</div>`;

  return `
    <div class="chat ${content.kind}">
      <div class="chat-sidebar">
        <div class="chat-platform">${CHAT_TITLES[content.kind]}</div>
        ${threads}
      </div>
      <div class="chat-main">
        <div class="chat-messages">${messages}</div>
        <div class="chat-compose">${renderCompose(content)}</div>
      </div>
    </div>`;
}

function renderActivityLog(content: ActivityLogContent): string {
  const percent = Math.floor((content.progress / content.max) * 100);
  const entries = content.entries.map(entry => `
    <div class="activity-entry">
      <span class="activity-time">${escapeHtml(entry.time)}</span>
      <span class="activity-text">${escapeHtml(entry.text)}</span>
    </div>`).join('');

  return `
    <div class="progress">
      <div class="progress-label">Conference fundraising: ${percent}%</div>
      <div class="progress-bar"><div class="progress-fill" style="width:${percent}%"></div></div>
    </div>
    <div class="activity-entries">${entries}</div>`;
}

function renderCall(call: PhoneCall): string {
  const header = `
    <div class="caller-name">${escapeHtml(call.caller.name)}</div>
    <div class="caller-number">${escapeHtml(call.caller.number)}</div>`;

  switch (call.state) {
    case 'ringing':
      return `
        ${header}
        <div class="call-status">Incoming call&hellip;</div>
        <div class="call-actions">
          <button class="answer-btn" data-action="answer">Answer</button>
          <button class="decline-btn" data-action="decline">Decline</button>
        </div>`;
    case 'answered':
    case 'ended': {
      const lines = call.transcript.map(line => `
        <div class="transcript-line ${line.speaker}">${escapeHtml(line.text.slice(0, line.shown))}</div>`).join('');
      return `
        ${header}
        <div class="transcript">${lines}</div>
        ${call.state === 'ended' ? '<div class="call-status">Call ended</div>' : ''}`;
    }
  }
}

function renderPopup(popup: Popup): string {
  switch (popup.type) {
    case 'toast':
      return `
        <div class="toast" data-action="open-toast">
          <div class="toast-heading">${escapeHtml(popup.heading)}</div>
          <div class="toast-body">${escapeHtml(popup.body)}</div>
        </div>`;
    case 'milestone':
      return `<div class="milestone">${escapeHtml(popup.text)}</div>`;
    case 'interrupt':
      return `
        <div class="interrupt">
          <div class="interrupt-from">@${escapeHtml(popup.from)}</div>
          <div class="interrupt-text">${escapeHtml(popup.text)}</div>
          <button class="dismiss-btn" data-action="dismiss">Got it</button>
        </div>`;
    case 'phone':
      return `<div class="phone">${renderCall(popup.call)}</div>`;
  }
}

export function contentHtml(content: WindowContent): string {
  switch (content.kind) {
    case 'inventory': return renderInventory(content);
    case 'ftl': return renderFtl(content);
    case 'zomboid': return renderZomboid(content);
    case 'outlook': return renderOutlook(content);
    case 'email-view': return renderEmailView(content);
    case 'reply': return renderReply(content);
    case 'messages':
    case 'slack':
    case 'discord':
      return renderChat(content);
    case 'activity-log': return renderActivityLog(content);
    case 'popup': return renderPopup(content.popup);
  }
}

export function renderContent(content: WindowContent, el: HTMLElement) {
  el.innerHTML = contentHtml(content);
}
