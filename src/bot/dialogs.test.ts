import { describe, expect, it } from 'vitest';
import { advanceDialog, startCampaignDialog, startChannelDialog, type DialogState } from './dialogs.js';

function run(inputs: string[]): ReturnType<typeof advanceDialog> {
  let state: DialogState | null = startCampaignDialog().next;
  let step: ReturnType<typeof advanceDialog> | null = null;
  for (const input of inputs) {
    if (!state) throw new Error('dialogue already ended');
    step = advanceDialog(state, input, 1);
    state = step.next;
  }
  if (!step) throw new Error('no input');
  return step;
}

describe('campaign dialogue', () => {
  it('collects text, budget and duration before submitting', () => {
    const step = run(['Buy our test widget', '1,000', '6', 'yes']);

    expect(step.next).toBeNull();
    expect(step.submit).toEqual({
      kind: 'campaign',
      draft: { adText: 'Buy our test widget', budget: 1000, durationHours: 6 },
    });
  });

  it('uses the default duration on "skip"', () => {
    const step = run(['ad', '50', 'skip', 'y']);

    expect(step.submit).toEqual({ kind: 'campaign', draft: { adText: 'ad', budget: 50, durationHours: 1 } });
  });

  it('stays on the budget step until the input is a positive whole number', () => {
    const step = run(['ad', '12.5']);

    expect(step.next).toEqual({ flow: 'campaign', step: 'budget', adText: 'ad' });
    expect(step.reply).toBe('The budget must be a positive whole number.');
  });

  it('discards the draft on "no"', () => {
    const step = run(['ad', '50', '2', 'no']);

    expect(step).toEqual({ next: null, reply: 'Campaign discarded.' });
  });

  it('asks again on an unclear confirmation', () => {
    const step = run(['ad', '50', '2', 'maybe']);

    expect(step.reply).toBe('Please reply "yes" or "no".');
    expect(step.next).toMatchObject({ step: 'confirm' });
  });
});

describe('channel dialogue', () => {
  it('submits the channel id it is given', () => {
    const start = startChannelDialog();
    if (!start.next) throw new Error('expected a state');

    const step = advanceDialog(start.next, ' @my_channel ', 1);

    expect(step.submit).toEqual({ kind: 'channel', telegramChannelId: '@my_channel' });
    expect(step.next).toBeNull();
  });
});
