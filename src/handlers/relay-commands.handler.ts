import { Injectable, Logger } from '@nestjs/common';
import { ChatHandler } from '../decorators/chat-handler.decorator';
import { ChatCommand, OnChatText } from '../decorators/chat-command.decorator';
import { ChatMessage } from '../models/chat-message.model';
import { SessionService } from '../services/session.service';
import { AgentClientService } from '../services/agent-client.service';
import { AgentApiError } from '../errors/agent-api.error';

export const EMPTY_MESSAGE_REPLY =
  'Looks like the message is empty. Please try again.';
export const AGENT_FAILURE_REPLY =
  'Could not get a reply from the AI agent. Please try again a bit later.';
export const NEW_SESSION_REPLY =
  'Started a new session. You can continue the conversation from a clean slate!';
export const HELP_REPLY =
  'Send a text message and I will forward it to the AI agent.\n' +
  'The /new command ends the current session and starts a new one.';

/**
 * Default chat commands and text forwarding for the relay
 */
@ChatHandler()
@Injectable()
export class RelayCommandsHandler {
  private readonly logger = new Logger(RelayCommandsHandler.name);

  constructor(
    private readonly sessionService: SessionService,
    private readonly agentClient: AgentClientService,
  ) {}

  @ChatCommand('start')
  async start(message: ChatMessage): Promise<void> {
    const sessionId = await this.sessionService.ensureSession(message.chatId);
    await message.reply(
      `Hi, ${message.firstName || 'there'}! I am connected to an AI agent.\n` +
        'Write a message and I will pass it on to the agent.\n' +
        'Use /new to start a new conversation.',
    );
    this.logger.log(`Chat ${message.chatId} started with session ${sessionId}`);
  }

  @ChatCommand('help')
  async help(message: ChatMessage): Promise<void> {
    await message.reply(HELP_REPLY);
  }

  @ChatCommand('new')
  async newConversation(message: ChatMessage): Promise<void> {
    await this.sessionService.resetSession(message.chatId);
    await message.reply(NEW_SESSION_REPLY);
  }

  /**
   * Forward user text to the agent and answer with its reply
   */
  @OnChatText()
  async forward(message: ChatMessage): Promise<void> {
    const text = message.text.trim();
    if (!text) {
      await message.reply(EMPTY_MESSAGE_REPLY);
      return;
    }

    let reply: string;
    try {
      const sessionId = await this.sessionService.ensureSession(message.chatId);
      const response = await this.agentClient.sendMessage(sessionId, text);
      reply = response.message;
    } catch (error) {
      if (!(error instanceof AgentApiError)) {
        throw error;
      }
      this.logger.error(
        `Agent error in chat ${message.chatId}: ${error.message}`,
        error.stack,
      );
      reply = AGENT_FAILURE_REPLY;
    }

    await message.reply(reply);
  }
}
