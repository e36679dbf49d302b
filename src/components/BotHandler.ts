import { Telegraf, Context } from 'telegraf';
import { errorMeta, logger } from '../utils/logger';
import { ConversationController, HELP_LINES } from './ConversationController';

const log = logger.child('bot');

// Telegram caps a single message at 4096 characters
export const MAX_MESSAGE_LENGTH = 4096;

export const splitMessage = (text: string, limit: number = MAX_MESSAGE_LENGTH): string[] => {
    if (text.length <= limit) {
        return [text];
    }

    const chunks: string[] = [];
    let rest = text;
    while (rest.length > limit) {
        const breakAt = rest.lastIndexOf('\n', limit);
        const cut = breakAt > 0 ? breakAt : limit;
        chunks.push(rest.slice(0, cut));
        rest = rest.slice(cut).replace(/^\n/, '');
    }
    if (rest) {
        chunks.push(rest);
    }
    return chunks;
};

export const extractCommandText = (text: string | undefined, command: string): string => {
    if (!text) return '';
    return text.replace(new RegExp(`^/${command}(@\\w+)?`), '').trim();
};

// Bot Handler Component - routes Telegram updates to the conversation controller
export class BotHandler {
    private bot: Telegraf<Context> | null = null;

    constructor(
        private readonly botToken: string,
        private readonly controller: ConversationController
    ) {}

    /** Register handlers and poll until the bot is stopped. */
    async start(): Promise<void> {
        const bot = new Telegraf(this.botToken);
        this.bot = bot;

        bot.catch(async (error: unknown, ctx) => {
            log.error('Telegram bot error', errorMeta(error));
            try {
                await ctx.reply('Sorry, something went wrong. Please try again later.');
            } catch (replyError) {
                log.warn('Could not send error reply', errorMeta(replyError));
            }
        });

        this.registerCommandHandlers(bot);
        this.registerMessageHandlers(bot);

        log.info('Bot polling started');
        await bot.launch();
    }

    async shutdown(reason: string = 'shutdown'): Promise<void> {
        if (this.bot) {
            this.bot.stop(reason);
            this.bot = null;
        }
    }

    private registerCommandHandlers(bot: Telegraf<Context>): void {
        const controller = this.controller;

        bot.command('start', async ctx => {
            if (!ctx.chat) return;
            const therapy = extractCommandText(ctx.message.text, 'start');
            await this.send(ctx, await controller.start(ctx.chat.id, therapy));
        });

        bot.command('load', async ctx => {
            if (!ctx.chat) return;
            const recordId = extractCommandText(ctx.message.text, 'load');
            await this.send(ctx, await controller.load(ctx.chat.id, recordId));
        });

        bot.command('records', async ctx => {
            await this.send(ctx, await controller.listRecords());
        });

        bot.command('status', async ctx => {
            if (!ctx.chat) return;
            await this.send(ctx, controller.status(ctx.chat.id));
        });

        bot.command('end', async ctx => {
            if (!ctx.chat) return;
            await ctx.sendChatAction('typing');
            await this.send(ctx, await controller.endSession(ctx.chat.id));
        });

        bot.command('save', async ctx => {
            if (!ctx.chat) return;
            await this.send(ctx, await controller.save(ctx.chat.id));
        });

        bot.command('debug', async ctx => {
            if (!ctx.chat) return;
            await this.send(ctx, controller.toggleDebug(ctx.chat.id));
        });

        bot.command('help', async ctx => {
            await ctx.reply(HELP_LINES.join('\n'));
        });
    }

    private registerMessageHandlers(bot: Telegraf<Context>): void {
        bot.on('text', async ctx => {
            if (!ctx.chat) return;
            const text = ctx.message.text;
            if (text.startsWith('/')) {
                await ctx.reply('Unknown command. Type /help for a list of commands.');
                return;
            }

            await ctx.sendChatAction('typing');
            await this.send(ctx, await this.controller.handleUtterance(ctx.chat.id, text));
        });
    }

    private async send(ctx: Context, replies: string[]): Promise<void> {
        for (const reply of replies) {
            for (const chunk of splitMessage(reply)) {
                await ctx.reply(chunk);
            }
        }
    }
}
