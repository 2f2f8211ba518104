import { SetMetadata } from '@nestjs/common';

export const CHAT_COMMAND_KEY = 'agent_relay:chat_command';
export const ON_CHAT_TEXT_KEY = 'agent_relay:on_chat_text';

/**
 * Routes a bot command (`/name`, case-insensitive) to the decorated method
 *
 * @param name Command name without the leading slash
 */
export function ChatCommand(name: string) {
  return (
    target: object,
    propertyKey: string | symbol,
    descriptor: PropertyDescriptor,
  ) => {
    SetMetadata(CHAT_COMMAND_KEY, name.toLowerCase())(descriptor.value);
    return descriptor;
  };
}

/**
 * Routes plain text messages (anything that is not a command) to the decorated method
 */
export function OnChatText() {
  return (
    target: object,
    propertyKey: string | symbol,
    descriptor: PropertyDescriptor,
  ) => {
    SetMetadata(ON_CHAT_TEXT_KEY, true)(descriptor.value);
    return descriptor;
  };
}
