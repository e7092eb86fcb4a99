import { Bot, InlineKeyboard, type Context } from 'grammy';
import { env, engineConfig } from '../config/env.js';
import type { Engine } from '../engine.js';
import type { CommandResult } from '../commands/index.js';
import { errorMessage } from '../shared/errors.js';
import type { Campaign, Channel, User } from '../shared/types.js';
import { SessionStore } from './session.js';
import {
  advanceDialog,
  startCampaignDialog,
  startChannelDialog,
  type DialogState,
  type DialogSubmission,
} from './dialogs.js';
import { escapeHtml } from './notifications.js';

export const bot = new Bot(env.BOT_TOKEN);

const sessions = new SessionStore<DialogState>(engineConfig.sessionTtlMs);

function describeCampaign(campaign: Campaign): string {
  const text = campaign.ad_text.length > 60 ? `${campaign.ad_text.slice(0, 57)}...` : campaign.ad_text;
  return `#${campaign.id} · ${campaign.state} · budget ${campaign.budget} · ${campaign.duration_hours}h\n${escapeHtml(text)}`;
}

function describeChannel(channel: Channel): string {
  return `#${channel.id} ${escapeHtml(channel.title ?? channel.telegram_channel_id)} · ${channel.state} · ${channel.subscribers} subscribers · trust ${channel.trust_score}`;
}

function numericArg(ctx: Context): number | null {
  const arg = typeof ctx.match === 'string' ? ctx.match.trim() : '';
  const value = Number(arg);
  return Number.isInteger(value) && value > 0 ? value : null;
}

async function replyResult<T>(ctx: Context, result: CommandResult<T>, onOk: (value: T) => string): Promise<void> {
  await ctx.reply(result.ok ? onOk(result.value) : result.error.message, { parse_mode: 'HTML' });
}

function registerHandlers(engine: Engine): void {
  const { commands } = engine;

  /** Resolve (or create) the engine user behind the sender. */
  const withUser = async (ctx: Context, fn: (user: User) => Promise<void>): Promise<void> => {
    if (!ctx.from) return;
    const result = await commands.ensureUser(ctx.from.id, ctx.from.username ?? null);
    if (!result.ok) {
      await ctx.reply(result.error.message);
      return;
    }
    await fn(result.value);
  };

  const submit = async (ctx: Context, user: User, submission: DialogSubmission): Promise<void> => {
    if (submission.kind === 'channel') {
      const result = await commands.registerChannel(user.id, submission.telegramChannelId);
      await replyResult(ctx, result, (v) =>
        [`Channel ${escapeHtml(v.channel.title ?? v.channel.telegram_channel_id)} is ${v.state}.`, ...v.guidance].join('\n'),
      );
      return;
    }

    const created = await commands.createCampaign(user.id, submission.draft);
    if (!created.ok) {
      await ctx.reply(created.error.message);
      return;
    }
    const funded = await commands.fundCampaign(user.id, created.value.id);
    await replyResult(ctx, funded, (c) => `Campaign #${c.id} is funded and on offer.`);
  };

  bot.command('start', (ctx) =>
    withUser(ctx, async () => {
      const keyboard = ctx.chat?.type === 'private'
        ? new InlineKeyboard().webApp('Open dashboard', env.MINI_APP_URL)
        : undefined;
      await ctx.reply(
        'Welcome! Advertisers fund campaigns held in escrow; channel owners accept them and get paid once the ad has stayed live.\n\n'
          + '/newcampaign · /campaigns · /balance · /topup <amount>\n'
          + '/addchannel · /channels · /verify <id> · /offers · /withdraw <id>',
        { reply_markup: keyboard },
      );
    }),
  );

  bot.command('balance', (ctx) =>
    withUser(ctx, async (user) => {
      await replyResult(ctx, await commands.getBalance(user.id), (balance) => `Your balance: <b>${balance}</b>`);
    }),
  );

  bot.command('topup', (ctx) =>
    withUser(ctx, async (user) => {
      const amount = numericArg(ctx);
      if (amount === null) {
        await ctx.reply('Usage: /topup <amount>');
        return;
      }
      const reference = `topup:tg:${ctx.update.update_id}`;
      await replyResult(ctx, await commands.topUp(user.id, amount, reference), (tx) => `Added ${tx.amount} to your balance.`);
    }),
  );

  bot.command('newcampaign', (ctx) =>
    withUser(ctx, async (user) => {
      const step = startCampaignDialog();
      if (step.next) sessions.set(user.telegram_id, step.next);
      await ctx.reply(step.reply);
    }),
  );

  bot.command('addchannel', (ctx) =>
    withUser(ctx, async (user) => {
      const step = startChannelDialog();
      if (step.next) sessions.set(user.telegram_id, step.next);
      await ctx.reply(step.reply);
    }),
  );

  bot.command('campaigns', (ctx) =>
    withUser(ctx, async (user) => {
      await replyResult(ctx, await commands.listMyCampaigns(user.id), (campaigns) =>
        campaigns.length === 0 ? 'You have no campaigns yet. Use /newcampaign.' : campaigns.map(describeCampaign).join('\n\n'),
      );
    }),
  );

  bot.command('cancel', (ctx) =>
    withUser(ctx, async (user) => {
      const id = numericArg(ctx);
      if (id === null) {
        if (sessions.delete(user.telegram_id)) {
          await ctx.reply('Dialogue cancelled.');
        } else {
          await ctx.reply('Usage: /cancel <campaign id>');
        }
        return;
      }
      await replyResult(ctx, await commands.cancelCampaign(user.id, id), (c) => `Campaign #${c.id} cancelled.`);
    }),
  );

  bot.command('channels', (ctx) =>
    withUser(ctx, async (user) => {
      await replyResult(ctx, await commands.listMyChannels(user.id), (channels) =>
        channels.length === 0 ? 'No channels yet. Use /addchannel.' : channels.map(describeChannel).join('\n'),
      );
    }),
  );

  bot.command('verify', (ctx) =>
    withUser(ctx, async (user) => {
      const id = numericArg(ctx);
      if (id === null) {
        await ctx.reply('Usage: /verify <channel id>');
        return;
      }
      await replyResult(ctx, await commands.verifyChannel(user.id, id), (v) =>
        [`Channel #${v.channel.id} is ${v.state}.`, ...v.guidance].join('\n'),
      );
    }),
  );

  bot.command('offers', (ctx) =>
    withUser(ctx, async (user) => {
      const result = await commands.listOffers(user.id);
      if (!result.ok) {
        await ctx.reply(result.error.message);
        return;
      }
      if (result.value.length === 0) {
        await ctx.reply('No offers right now.');
        return;
      }
      for (const campaign of result.value.slice(0, 10)) {
        await ctx.reply(describeCampaign(campaign), {
          parse_mode: 'HTML',
          reply_markup: new InlineKeyboard().text('Accept', `accept:${campaign.id}`),
        });
      }
    }),
  );

  bot.command('withdraw', (ctx) =>
    withUser(ctx, async (user) => {
      const id = numericArg(ctx);
      if (id === null) {
        await ctx.reply('Usage: /withdraw <campaign id>');
        return;
      }
      await replyResult(ctx, await commands.withdrawAcceptance(user.id, id), (c) => `You withdrew from campaign #${c.id}.`);
    }),
  );

  bot.callbackQuery(/^accept:(\d+)$/, (ctx) =>
    withUser(ctx, async (user) => {
      const campaignId = Number(ctx.match[1]);
      const result = await commands.acceptOffer(user.id, campaignId);
      await ctx.answerCallbackQuery({ text: result.ok ? 'Accepted' : result.error.message });
      if (result.ok) {
        await ctx.editMessageReplyMarkup({ reply_markup: undefined });
        await ctx.reply(`You accepted campaign #${campaignId}. It will be posted automatically.`);
      }
    }),
  );

  bot.on('message:text', (ctx) =>
    withUser(ctx, async (user) => {
      const state = sessions.get(user.telegram_id);
      if (!state) return;

      const step = advanceDialog(state, ctx.message.text, engineConfig.defaultDurationHours);
      if (step.next) {
        sessions.set(user.telegram_id, step.next);
      } else {
        sessions.delete(user.telegram_id);
      }
      await ctx.reply(step.reply);
      if (step.submit) await submit(ctx, user, step.submit);
    }),
  );

  // Error handler
  bot.catch((err) => {
    console.error('[bot] Error:', err.message);
  });
}

export async function startBot(engine: Engine): Promise<void> {
  const me = await bot.api.getMe();
  console.log(`[bot] Bot username: @${me.username}`);

  registerHandlers(engine);
  engine.scheduler.every('session-sweep', engineConfig.sessionTtlMs, async () => {
    const removed = sessions.sweep();
    if (removed > 0) console.log(`[bot] Dropped ${removed} idle dialogue session(s)`);
  });

  console.log('[bot] Starting Telegram bot...');
  // Do not await: polling runs indefinitely.
  void bot.start().catch((err) => {
    console.error('[bot] Polling failed:', errorMessage(err));
  });
}
