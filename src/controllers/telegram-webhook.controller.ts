import {
  BadRequestException,
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Post,
  UnauthorizedException,
} from '@nestjs/common';
import {
  isTelegramUpdate,
  TelegramTransportService,
} from '../services/telegram-transport.service';
import { TELEGRAM_SECRET_HEADER } from '../utils/constants';

/**
 * Receives Telegram webhook pushes when the transport runs in webhook mode.
 */
@Controller('telegram')
export class TelegramWebhookController {
  private readonly logger = new Logger(TelegramWebhookController.name);

  constructor(private readonly transport: TelegramTransportService) {}

  @Post('webhook')
  @HttpCode(HttpStatus.OK)
  async handleUpdate(
    @Body() body: unknown,
    @Headers(TELEGRAM_SECRET_HEADER) secretToken?: string,
  ): Promise<{ ok: true }> {
    if (this.transport.mode !== 'webhook') {
      throw new NotFoundException('Telegram webhook is not enabled');
    }

    const { webhookSecret } = this.transport.options;
    if (webhookSecret && secretToken !== webhookSecret) {
      this.logger.warn('Rejected Telegram update with a wrong secret token');
      throw new UnauthorizedException('Invalid secret token');
    }

    if (!isTelegramUpdate(body)) {
      throw new BadRequestException('Missing update_id in request body');
    }

    const updateId = body.update_id;
    this.logger.debug(`Received Telegram update ${updateId}`);
    // Acknowledge before the agent round trip so Telegram does not redeliver
    void this.transport.handleUpdate(body).catch((error: unknown) => {
      this.logger.error(
        `Failed to process Telegram update ${updateId}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    });
    return { ok: true };
  }
}
