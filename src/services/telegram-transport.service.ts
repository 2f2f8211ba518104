import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import type { Update } from 'telegraf/types';
import { TelegramOptions } from '../interfaces/config.interface';
import { ChatMessage } from '../models/chat-message.model';
import { RelayService } from './relay.service';

export function isTelegramUpdate(body: unknown): body is Update {
  return (
    typeof body === 'object' &&
    body !== null &&
    'update_id' in body &&
    typeof body.update_id === 'number'
  );
}

/**
 * Telegram side of the relay. Text messages become ChatMessage instances
 * handed to the RelayService.
 */
@Injectable()
export class TelegramTransportService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(TelegramTransportService.name);
  private readonly bot: Telegraf;
  private polling = false;

  constructor(
    readonly options: TelegramOptions,
    private readonly relay: RelayService,
    bot?: Telegraf,
  ) {
    this.bot = bot ?? new Telegraf(options.botToken);

    this.bot.on(message('text'), (ctx) =>
      this.relay.handle(
        new ChatMessage({
          chatId: String(ctx.message.chat.id),
          userId: ctx.message.from ? String(ctx.message.from.id) : undefined,
          firstName: ctx.message.from?.first_name,
          text: ctx.message.text,
          reply: async (text) => {
            await ctx.reply(text);
          },
        }),
      ),
    );

    this.bot.catch((error, ctx) => {
      this.logger.error(
        `Unhandled error while processing update ${ctx.update.update_id}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    });
  }

  get mode(): 'webhook' | 'polling' {
    return this.options.transport ?? 'polling';
  }

  /**
   * Feed an update received on the webhook endpoint to the bot
   */
  async handleUpdate(update: Update): Promise<void> {
    await this.bot.handleUpdate(update);
  }

  async onApplicationBootstrap(): Promise<void> {
    const me = await this.bot.telegram.getMe();
    this.bot.botInfo = me;
    this.logger.log(`Telegram bot started as @${me.username} (${this.mode})`);

    if (this.mode === 'webhook') {
      if (this.options.webhookUrl) {
        await this.bot.telegram.setWebhook(this.options.webhookUrl, {
          secret_token: this.options.webhookSecret,
        });
        this.logger.log(`Registered Telegram webhook ${this.options.webhookUrl}`);
      }
      return;
    }

    // A previously configured webhook would make getUpdates fail
    try {
      await this.bot.telegram.deleteWebhook();
      this.logger.log('Removed existing Telegram webhook (if any)');
    } catch (error) {
      this.logger.debug(
        `Could not delete webhook: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    this.polling = true;
    this.logger.log('Starting polling loop');
    this.bot.launch().catch((error: unknown) => {
      this.polling = false;
      this.logger.error(
        `Telegram polling stopped: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    });
  }

  onApplicationShutdown(signal?: string): void {
    this.logger.log('Telegram bot is shutting down');
    if (this.polling) {
      this.polling = false;
      this.bot.stop(signal);
    }
  }
}
