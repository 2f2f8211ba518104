import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, MetadataScanner } from '@nestjs/core';
import { InstanceWrapper } from '@nestjs/core/injector/instance-wrapper';
import { CHAT_HANDLER_KEY } from '../decorators/chat-handler.decorator';
import {
  CHAT_COMMAND_KEY,
  ON_CHAT_TEXT_KEY,
} from '../decorators/chat-command.decorator';
import { ChatMessage } from '../models/chat-message.model';

type ChatRoute = (message: ChatMessage) => Promise<unknown>;

/**
 * Dispatches incoming chat messages to the methods of @ChatHandler() providers
 */
@Injectable()
export class RelayService implements OnModuleInit {
  private readonly logger = new Logger(RelayService.name);
  private readonly commandRoutes: Map<string, ChatRoute> = new Map();
  private textRoute: ChatRoute | null = null;

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly metadataScanner: MetadataScanner,
  ) {}

  onModuleInit(): void {
    this.discoverHandlers();
    this.logger.log(
      `Registered commands: ${[...this.commandRoutes.keys()].map((name) => `/${name}`).join(', ') || 'none'}`,
    );
    if (!this.textRoute) {
      this.logger.warn('No @OnChatText() handler found, plain text is ignored');
    }
  }

  /**
   * Route one message. Handler errors are logged and not rethrown.
   */
  async handle(message: ChatMessage): Promise<void> {
    const command = message.command;
    const route = command
      ? this.commandRoutes.get(command.name)
      : this.textRoute;

    if (!route) {
      this.logger.debug(
        `No handler for ${command ? `/${command.name}` : 'text'} in chat ${message.chatId}`,
      );
      return;
    }

    try {
      await route(message);
    } catch (error) {
      this.logger.error(
        `Unhandled error while processing message in chat ${message.chatId}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    }
  }

  /**
   * Discover all chat handler providers in the application
   */
  private discoverHandlers(): void {
    const handlers = this.discoveryService
      .getProviders()
      .filter((wrapper) => this.isChatHandler(wrapper));

    for (const wrapper of handlers) {
      const instance: unknown = wrapper.instance;
      if (typeof instance !== 'object' || instance === null) {
        continue;
      }
      const prototype: object | null = Object.getPrototypeOf(instance);
      if (!prototype) {
        continue;
      }

      for (const methodName of this.metadataScanner.getAllMethodNames(prototype)) {
        const method: unknown = Reflect.get(instance, methodName);
        if (typeof method !== 'function') {
          continue;
        }
        const route: ChatRoute = async (message) =>
          Reflect.apply(method, instance, [message]);

        const command: unknown = Reflect.getMetadata(CHAT_COMMAND_KEY, method);
        if (typeof command === 'string') {
          if (this.commandRoutes.has(command)) {
            this.logger.warn(`Command /${command} is handled more than once`);
          }
          this.commandRoutes.set(command, route);
        }

        if (Reflect.getMetadata(ON_CHAT_TEXT_KEY, method)) {
          if (this.textRoute) {
            this.logger.warn(
              `Replacing text handler with ${instance.constructor.name}.${methodName}`,
            );
          }
          this.textRoute = route;
        }
      }
    }
  }

  /**
   * Check if an instance wrapper has the @ChatHandler decorator
   */
  private isChatHandler(wrapper: InstanceWrapper): boolean {
    const instance: unknown = wrapper.instance;
    if (typeof instance !== 'object' || instance === null) {
      return false;
    }
    return Boolean(Reflect.getMetadata(CHAT_HANDLER_KEY, instance.constructor));
  }
}
