import { createCampaignSchema } from '../commands/index.js';

export type DialogState =
  | { flow: 'campaign'; step: 'ad_text' }
  | { flow: 'campaign'; step: 'budget'; adText: string }
  | { flow: 'campaign'; step: 'duration'; adText: string; budget: number }
  | { flow: 'campaign'; step: 'confirm'; adText: string; budget: number; durationHours: number }
  | { flow: 'channel'; step: 'channel_id' };

export interface CampaignDraft {
  adText: string;
  budget: number;
  durationHours: number;
}

export type DialogSubmission =
  | { kind: 'campaign'; draft: CampaignDraft }
  | { kind: 'channel'; telegramChannelId: string };

export interface DialogStep {
  /** `null` ends the dialogue. */
  next: DialogState | null;
  reply: string;
  submit?: DialogSubmission;
}

const YES = new Set(['yes', 'y', 'confirm', 'ok']);
const NO = new Set(['no', 'n', 'cancel']);

export function startCampaignDialog(): DialogStep {
  return {
    next: { flow: 'campaign', step: 'ad_text' },
    reply: 'Send the text of your ad.',
  };
}

export function startChannelDialog(): DialogStep {
  return {
    next: { flow: 'channel', step: 'channel_id' },
    reply:
      'Add this bot as an administrator of your channel, then send the channel username (e.g. @mychannel) or numeric id.',
  };
}

function parsePositiveInteger(text: string): number | null {
  const value = Number(text.replace(/[\s,_]/g, ''));
  return Number.isInteger(value) && value > 0 ? value : null;
}

/** Feed one message into the dialogue and get the reply plus the next state. */
export function advanceDialog(state: DialogState, input: string, defaultDurationHours: number): DialogStep {
  const text = input.trim();

  if (state.flow === 'channel') {
    if (!text) return { next: state, reply: 'Please send the channel username or id.' };
    return { next: null, reply: 'Checking your channel...', submit: { kind: 'channel', telegramChannelId: text } };
  }

  switch (state.step) {
    case 'ad_text': {
      const parsed = createCampaignSchema.shape.adText.safeParse(text);
      if (!parsed.success) {
        return { next: state, reply: 'The ad text must be between 1 and 4096 characters. Send it again.' };
      }
      return {
        next: { flow: 'campaign', step: 'budget', adText: parsed.data },
        reply: 'What is your budget? Send a whole number.',
      };
    }
    case 'budget': {
      const budget = parsePositiveInteger(text);
      if (budget === null) {
        return { next: state, reply: 'The budget must be a positive whole number.' };
      }
      return {
        next: { flow: 'campaign', step: 'duration', adText: state.adText, budget },
        reply: `How many hours must the ad stay live? Send a number or "skip" for ${defaultDurationHours}h.`,
      };
    }
    case 'duration': {
      const durationHours = text.toLowerCase() === 'skip' ? defaultDurationHours : Number(text);
      if (!Number.isFinite(durationHours) || durationHours <= 0) {
        return { next: state, reply: 'The duration must be a positive number of hours.' };
      }
      return {
        next: { flow: 'campaign', step: 'confirm', adText: state.adText, budget: state.budget, durationHours },
        reply:
          `Budget: ${state.budget}\nDuration: ${durationHours}h\n\n${state.adText}\n\n` +
          'Reply "yes" to fund and publish this campaign, or "no" to discard it.',
      };
    }
    case 'confirm': {
      const answer = text.toLowerCase();
      if (YES.has(answer)) {
        return {
          next: null,
          reply: 'Funding your campaign...',
          submit: {
            kind: 'campaign',
            draft: { adText: state.adText, budget: state.budget, durationHours: state.durationHours },
          },
        };
      }
      if (NO.has(answer)) {
        return { next: null, reply: 'Campaign discarded.' };
      }
      return { next: state, reply: 'Please reply "yes" or "no".' };
    }
  }
}
