import { TranslationError } from '../types/index.js';
import { isRecord } from '../utils/json.js';

export type ChatTextPart = {
  readonly type: 'text';
  readonly text: string;
};

export type ChatMessageContent = string | null | ChatTextPart | ReadonlyArray<ChatTextPart>;

export type ChatMessage = {
  readonly role?: string;
  readonly content?: ChatMessageContent;
};

function stringifyContent(content: unknown): string {
  if (content === null || content === undefined) {
    return '';
  }
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .map((part: unknown) => stringifyContent(part))
      .filter((text) => text.length > 0)
      .join('\n');
  }
  if (isRecord(content)) {
    const text = content['text'];
    if (content['type'] === 'text' && typeof text === 'string') {
      return text;
    }
    throw new TranslationError(`unsupported content part type '${String(content['type'])}'`);
  }
  throw new TranslationError('content must be text or a list of text parts');
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function roleOf(message: unknown, index: number): string {
  if (!isRecord(message)) {
    throw new TranslationError(
      `chat message ${index} must be an object, got ${describeValue(message)}`,
    );
  }
  const role = message['role'];
  if (role === undefined || role === null || role === '') {
    return 'user';
  }
  if (typeof role !== 'string') {
    throw new TranslationError(
      `chat message ${index} has a role of type ${describeValue(role)}; expected a string`,
    );
  }
  return role;
}

/**
 * Flattens chat messages into a single prompt: one `ROLE: text` line per
 * message, then a trailing `ASSISTANT:` cue.
 */
export function messagesToPrompt(messages: ReadonlyArray<ChatMessage>): string {
  // Callers without type checking can pass anything here.
  const items: unknown = messages;
  if (!Array.isArray(items)) {
    throw new TranslationError(`messages must be an array, got ${describeValue(items)}`);
  }

  const lines: Array<string> = [];

  items.forEach((message: unknown, index) => {
    const role = roleOf(message, index);
    let text: string;
    try {
      text = stringifyContent(isRecord(message) ? message['content'] : undefined);
    } catch (err) {
      if (err instanceof TranslationError) {
        throw new TranslationError(
          `unsupported chat message content for role '${role}': ${err.message}`,
          err,
        );
      }
      throw err;
    }
    lines.push(`${role.toUpperCase()}: ${text}`);
  });

  lines.push('ASSISTANT:');
  return lines.join('\n');
}
