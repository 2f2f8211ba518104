/**
 * A command addressed to the bot, e.g. `/new` or `/new@relay_bot args`
 */
export interface ChatCommandInvocation {
  name: string;
  args: string;
}

export interface ChatMessageData {
  chatId: string;
  userId?: string;
  firstName?: string;
  text: string;
  reply: (text: string) => Promise<void>;
}

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s+([\s\S]*))?$/;

/**
 * Represents an incoming chat text message with a way to answer it
 */
export class ChatMessage {
  /**
   * Chat the message came from. Sessions are kept per chat.
   */
  readonly chatId: string;

  readonly userId?: string;

  readonly firstName?: string;

  /**
   * Raw message text
   */
  readonly text: string;

  private readonly sendReply: (text: string) => Promise<void>;

  constructor(data: ChatMessageData) {
    this.chatId = data.chatId;
    this.userId = data.userId;
    this.firstName = data.firstName;
    this.text = data.text;
    this.sendReply = data.reply;
  }

  /**
   * The bot command this message invokes, or null for plain text
   */
  get command(): ChatCommandInvocation | null {
    const match = COMMAND_PATTERN.exec(this.text.trim());
    if (!match) {
      return null;
    }
    return { name: match[1].toLowerCase(), args: (match[2] ?? '').trim() };
  }

  /**
   * Send a text reply to the same chat
   */
  async reply(text: string): Promise<void> {
    await this.sendReply(text);
  }
}
