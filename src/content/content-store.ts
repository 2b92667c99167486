/**
 * Content Store - read-only content loaded from static JSON documents.
 *
 * Each document maps a category to an ordered array of records. A document
 * that is missing or malformed falls back to the built-in defaults; a
 * malformed record inside a good document is skipped. Drawing from an empty
 * or exhausted channel yields that channel's placeholder instead of failing.
 */

import type {
  CallerScript,
  ChannelData,
  ChannelKey,
  ChannelMessage,
  ContentChannels,
  DirectMessage,
  DocumentFetcher,
  DocumentName,
  Draw,
  EmailTemplate,
  MilestoneText,
  PhoneTurn,
  RawDocuments,
  SelectionPolicy,
} from './types';
import { DOCUMENT_NAMES } from './types';
import { DEFAULT_CHATTER, DEFAULT_EMAILS, DEFAULT_PHONE_CALLS, PLACEHOLDERS } from './defaults';
import { pickIndex } from '../random';
import type { Rng } from '../random';

// Record guards

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString);
}

function isEmailTemplate(value: unknown): value is EmailTemplate {
  return isObject(value)
    && isString(value.sender)
    && isString(value.subject)
    && isString(value.message)
    && isStringArray(value.responses);
}

function isPhoneTurn(value: unknown): value is PhoneTurn {
  return isObject(value)
    && (value.speaker === 'caller' || value.speaker === 'player')
    && isString(value.text);
}

function isCallerScript(value: unknown): value is CallerScript {
  return isObject(value)
    && isString(value.name)
    && isString(value.number)
    && Array.isArray(value.turns)
    && value.turns.length > 0
    && value.turns.every(isPhoneTurn);
}

function isDirectMessage(value: unknown): value is DirectMessage {
  return isObject(value) && isString(value.from) && isString(value.text);
}

function isChannelMessage(value: unknown): value is ChannelMessage {
  return isObject(value) && isString(value.channel) && isString(value.from) && isString(value.text);
}

function isMilestoneText(value: unknown): value is MilestoneText {
  return isObject(value) && typeof value.threshold === 'number' && isString(value.text);
}

// Document parsing

function asDocument(raw: unknown, name: DocumentName): Record<string, unknown> {
  if (!isObject(raw)) {
    throw new Error(`${name} is not a JSON object`);
  }
  return raw;
}

function records<T>(doc: Record<string, unknown>, category: string, guard: (value: unknown) => value is T, name: DocumentName): T[] {
  const list = doc[category];
  if (list === undefined) {
    console.warn(`[Content] ${name} has no "${category}" category`);
    return [];
  }
  if (!Array.isArray(list)) {
    throw new Error(`${name}: "${category}" is not an array`);
  }
  const valid = list.filter(guard);
  if (valid.length < list.length) {
    console.warn(`[Content] ${name}: skipped ${list.length - valid.length} malformed "${category}" record(s)`);
  }
  return valid;
}

function parseEmails(raw: unknown): Pick<ChannelData, 'emails.regular' | 'emails.praise'> {
  const doc = asDocument(raw, 'emails.json');
  return {
    'emails.regular': records(doc, 'regular', isEmailTemplate, 'emails.json'),
    'emails.praise': records(doc, 'praise', isEmailTemplate, 'emails.json'),
  };
}

function parsePhoneCalls(raw: unknown): Pick<ChannelData, 'phone.callers'> {
  const doc = asDocument(raw, 'phone_calls.json');
  return {
    'phone.callers': records(doc, 'callers', isCallerScript, 'phone_calls.json'),
  };
}

function parseChatter(raw: unknown): typeof DEFAULT_CHATTER {
  const doc = asDocument(raw, 'chatter.json');
  return {
    'chat.messages': records(doc, 'messages', isDirectMessage, 'chatter.json'),
    'chat.slack': records(doc, 'slack', isChannelMessage, 'chatter.json'),
    'chat.discord': records(doc, 'discord', isChannelMessage, 'chatter.json'),
    'chat.interrupts': records(doc, 'interrupts', isString, 'chatter.json'),
    'chat.activities': records(doc, 'activities', isString, 'chatter.json'),
    'chat.milestones': records(doc, 'milestones', isMilestoneText, 'chatter.json'),
  };
}

function parseOr<T>(raw: unknown, name: DocumentName, parse: (raw: unknown) => T, fallback: T): T {
  if (raw === undefined) {
    console.log(`[Content] ${name} not available, using built-in content`);
    return fallback;
  }
  try {
    return parse(raw);
  } catch (err) {
    console.warn(`[Content] ${name} is malformed, using built-in content: ${err instanceof Error ? err.message : err}`);
    return fallback;
  }
}

/**
 * Fetch and parse one JSON document.
 */
export async function fetchJson(url: string): Promise<unknown> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Failed to fetch ${url}: ${response.status} ${response.statusText}`);
  }
  return response.json();
}

interface Cursor {
  next: number;
  used: Set<number>;
}

export class ContentStore {
  private data: ChannelData;
  private cursors = new Map<ChannelKey, Cursor>();

  private constructor(data: ChannelData) {
    this.data = data;
  }

  /**
   * Load every document from baseUrl. Never rejects: each document that
   * cannot be fetched or parsed degrades to its defaults.
   */
  static async load(fetcher: DocumentFetcher = fetchJson, baseUrl = './content'): Promise<ContentStore> {
    const raw: RawDocuments = {};

    await Promise.all(DOCUMENT_NAMES.map(async name => {
      try {
        raw[name] = await fetcher(`${baseUrl}/${name}`);
      } catch (err) {
        console.warn(`[Content] Failed to load ${name}: ${err instanceof Error ? err.message : err}`);
      }
    }));

    const store = ContentStore.fromDocuments(raw);
    console.log(`[Content] Loaded ${store.count('emails.regular')} emails, ${store.count('phone.callers')} callers, ${store.count('chat.activities')} activities`);
    return store;
  }

  /** Build a store from already-parsed documents. */
  static fromDocuments(raw: RawDocuments): ContentStore {
    return new ContentStore({
      ...parseOr(raw['emails.json'], 'emails.json', parseEmails, DEFAULT_EMAILS),
      ...parseOr(raw['phone_calls.json'], 'phone_calls.json', parsePhoneCalls, DEFAULT_PHONE_CALLS),
      ...parseOr(raw['chatter.json'], 'chatter.json', parseChatter, DEFAULT_CHATTER),
    });
  }

  /** Store with only the built-in content. */
  static defaults(): ContentStore {
    return ContentStore.fromDocuments({
      'emails.json': undefined,
      'phone_calls.json': undefined,
      'chatter.json': undefined,
    });
  }

  count(channel: ChannelKey): number {
    return this.data[channel].length;
  }

  all<K extends ChannelKey>(channel: K): readonly ContentChannels[K][] {
    return this.data[channel];
  }

  /**
   * Take the next record from a channel according to the policy.
   *
   * - sequential: in document order; exhausted once every record was drawn
   * - random: uniform pick; exhausted only when the channel is empty
   * - shuffle: no repeats until every record was drawn, then a new round
   */
  draw<K extends ChannelKey>(channel: K, policy: SelectionPolicy, random: Rng): Draw<K> {
    const list: ContentChannels[K][] = this.data[channel];
    const placeholder: Draw<K> = { entry: PLACEHOLDERS[channel], exhausted: true };
    if (list.length === 0) return placeholder;

    const cursor = this.cursor(channel);

    switch (policy) {
      case 'sequential': {
        if (cursor.next >= list.length) return placeholder;
        return { entry: list[cursor.next++], exhausted: false };
      }

      case 'random':
        return { entry: list[pickIndex(random, list.length)], exhausted: false };

      case 'shuffle': {
        if (cursor.used.size >= list.length) cursor.used.clear();
        const available = list.map((_, i) => i).filter(i => !cursor.used.has(i));
        const index = available[pickIndex(random, available.length)];
        cursor.used.add(index);
        return { entry: list[index], exhausted: false };
      }
    }
  }

  /** Milestone text for a threshold, or a generic line. */
  milestoneText(threshold: number): string {
    const found = this.data['chat.milestones'].find(m => m.threshold === threshold);
    return found ? found.text : `${threshold}% Complete!`;
  }

  private cursor(channel: ChannelKey): Cursor {
    let cursor = this.cursors.get(channel);
    if (!cursor) {
      cursor = { next: 0, used: new Set() };
      this.cursors.set(channel, cursor);
    }
    return cursor;
  }
}
