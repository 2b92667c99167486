/**
 * Content type definitions - the records the static JSON documents hold.
 */

export interface EmailTemplate {
  sender: string;
  subject: string;
  message: string;
  responses: string[];
}

export type Speaker = 'caller' | 'player';

export interface PhoneTurn {
  speaker: Speaker;
  text: string;
}

export interface CallerScript {
  name: string;
  number: string;
  turns: PhoneTurn[];
}

export interface DirectMessage {
  from: string;
  text: string;
}

export interface ChannelMessage {
  channel: string;
  from: string;
  text: string;
}

export interface MilestoneText {
  threshold: number;
  text: string;
}

/** Every channel the store serves, keyed `<document>.<category>`. */
export interface ContentChannels {
  'emails.regular': EmailTemplate;
  'emails.praise': EmailTemplate;
  'phone.callers': CallerScript;
  'chat.messages': DirectMessage;
  'chat.slack': ChannelMessage;
  'chat.discord': ChannelMessage;
  'chat.interrupts': string;
  'chat.activities': string;
  'chat.milestones': MilestoneText;
}

export type ChannelKey = keyof ContentChannels;

export type ChannelData = { [K in ChannelKey]: ContentChannels[K][] };

export type SelectionPolicy = 'sequential' | 'random' | 'shuffle';

export interface Draw<K extends ChannelKey> {
  entry: ContentChannels[K];
  /** True when the channel had nothing left and `entry` is the placeholder */
  exhausted: boolean;
}

export const DOCUMENT_NAMES = ['emails.json', 'phone_calls.json', 'chatter.json'] as const;

export type DocumentName = typeof DOCUMENT_NAMES[number];

/** Parsed-but-unvalidated documents; a missing key means the document is missing. */
export type RawDocuments = Partial<Record<DocumentName, unknown>>;

export type DocumentFetcher = (url: string) => Promise<unknown>;
