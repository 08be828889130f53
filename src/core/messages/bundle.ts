/**
 * Message bundles: flat YAML mappings of keys to strings.
 *
 * Model-building code receives a MessageSource as a parameter instead of
 * looking one up globally.
 */
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';

export interface MessageSource {
  get(key: string): string;
  /** A comma-separated message split into trimmed, non-empty items. */
  getList(key: string): string[];
}

const MessagesSchema = z.record(z.string(), z.coerce.string());

export const DEFAULT_MESSAGES_PATH = fileURLToPath(
  new URL('../../../resources/messages.yaml', import.meta.url)
);

export class MessageBundle implements MessageSource {
  private readonly messages: ReadonlyMap<string, string>;

  constructor(messages: Record<string, string>) {
    this.messages = new Map(Object.entries(messages));
  }

  get(key: string): string {
    const message = this.messages.get(key);
    if (message === undefined) {
      throw new ConfigError(ErrorCodes.MISSING_MESSAGE, `No message for key ${key}`, { key });
    }
    return message;
  }

  getList(key: string): string[] {
    return this.get(key)
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
}

export async function loadMessages(filePath: string = DEFAULT_MESSAGES_PATH): Promise<MessageBundle> {
  const messages = await loadYamlWithSchema(filePath, MessagesSchema);
  return new MessageBundle(messages);
}
