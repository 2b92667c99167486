/**
 * Built-in content - the minimal set used when a document is missing or
 * malformed, plus one placeholder record per channel for exhausted draws.
 * The full content lives in public/content/*.json.
 */

import type { ChannelData, ContentChannels, ChannelKey } from './types';

export const DEFAULT_EMAILS: Pick<ChannelData, 'emails.regular' | 'emails.praise'> = {
  'emails.regular': [
    {
      sender: 'events@summitfund.org',
      subject: 'Planning Update',
      message: 'Quick update on the conference plans. Nothing needs your attention right now.',
      responses: ['Thanks!', 'Noted.', 'Sounds good.'],
    },
    {
      sender: 'finance@summitfund.org',
      subject: 'Budget Review Needed',
      message: 'Could you take a look at the budget sheet when you get a minute?',
      responses: ['On it.', 'Will do.', 'Looking now.'],
    },
  ],
  'emails.praise': [
    {
      sender: 'board@summitfund.org',
      subject: 'Priya is on fire',
      message: 'Just wanted to say Priya has been carrying the fundraising push. Great team you have there!',
      responses: ['Thanks, she really is.', "I'll pass it on.", 'We make a good team!'],
    },
  ],
};

export const DEFAULT_PHONE_CALLS: Pick<ChannelData, 'phone.callers'> = {
  'phone.callers': [
    {
      name: 'Dana Whitlock',
      number: '(555) 010-2231',
      turns: [
        { speaker: 'caller', text: "Hey! How's the fundraiser coming along?" },
        { speaker: 'player', text: "Great! I've been at it all day." },
        { speaker: 'caller', text: 'Love to hear it. Keep it up!' },
      ],
    },
  ],
};

export const DEFAULT_CHATTER: Pick<
  ChannelData,
  'chat.messages' | 'chat.slack' | 'chat.discord' | 'chat.interrupts' | 'chat.activities' | 'chat.milestones'
> = {
  'chat.messages': [
    { from: 'Mom', text: 'Are you eating lunch today?' },
    { from: 'Dana', text: 'Did you see the sponsor deck?' },
  ],
  'chat.slack': [
    { channel: '# general', from: 'Priya', text: 'Pushed the new sponsor list to the drive.' },
  ],
  'chat.discord': [
    { channel: '# fundraising', from: 'Priya', text: 'Two more pledges came in overnight.' },
  ],
  'chat.interrupts': [
    'Hey, do you have a sec to look at the budget sheet?',
    'Are you around? We need to talk about the venue.',
  ],
  'chat.activities': [
    'Priya confirmed the venue booking',
    'Priya secured a new sponsor',
    'Priya updated the budget sheet',
  ],
  'chat.milestones': [
    { threshold: 25, text: '25% Complete! Great progress!' },
    { threshold: 50, text: '50% Complete! Halfway there!' },
    { threshold: 75, text: '75% Complete! Almost done!' },
    { threshold: 90, text: '90% Complete! Final stretch!' },
  ],
};

export const PLACEHOLDERS: { [K in ChannelKey]: ContentChannels[K] } = {
  'emails.regular': {
    sender: 'noreply@summitfund.org',
    subject: '(no subject)',
    message: 'This message has no content.',
    responses: ['OK'],
  },
  'emails.praise': {
    sender: 'noreply@summitfund.org',
    subject: 'Nice work, team',
    message: 'Things are moving along nicely.',
    responses: ['Thanks!'],
  },
  'phone.callers': {
    name: 'Unknown Caller',
    number: '(555) 000-0000',
    turns: [
      { speaker: 'caller', text: 'Hello? ... Sorry, wrong number.' },
    ],
  },
  'chat.messages': { from: 'Unknown', text: 'Hey' },
  'chat.slack': { channel: '# general', from: 'Slackbot', text: 'Reminder: stay hydrated.' },
  'chat.discord': { channel: '# general', from: 'Clyde', text: 'Ping!' },
  'chat.interrupts': 'Hey, are you there?',
  'chat.activities': 'Priya did some work',
  'chat.milestones': { threshold: 0, text: 'Milestone reached!' },
};
