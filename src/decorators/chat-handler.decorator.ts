import { SetMetadata } from '@nestjs/common';

/**
 * Metadata key for chat handler classes
 */
export const CHAT_HANDLER_KEY = 'agent_relay:chat_handler';

/**
 * Marks a provider as a chat handler. Its @ChatCommand() and @OnChatText()
 * methods are discovered by the RelayService on module init.
 *
 * @example
 * ```typescript
 * @ChatHandler()
 * @Injectable()
 * export class PingHandler {
 *   @ChatCommand('ping')
 *   async ping(message: ChatMessage) {
 *     await message.reply('pong');
 *   }
 * }
 * ```
 */
export function ChatHandler() {
  return SetMetadata(CHAT_HANDLER_KEY, true);
}
