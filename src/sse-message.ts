/**
 * SSE Message framing
 *
 * Serializes messages to the text/event-stream wire format:
 *   id: <id>
 *   event: <event>
 *   retry: <ms>
 *   data: <line>   (one per line of data)
 *   <blank line>
 */

import type { SseMessage } from './types.js';

const LINE_BREAK = /\r\n|\r|\n/;

// Field values other than data are single-line
function singleLine(value: string): string {
  return value.replace(/[\r\n]+/g, '');
}

/**
 * Frame one message, terminated by a blank line
 */
export function formatMessage(message: SseMessage): string {
  const lines: string[] = [];

  if (message.id !== undefined) {
    lines.push(`id: ${singleLine(message.id)}`);
  }
  if (message.event) {
    lines.push(`event: ${singleLine(message.event)}`);
  }
  if (message.retry !== undefined && Number.isInteger(message.retry) && message.retry >= 0) {
    lines.push(`retry: ${message.retry}`);
  }
  for (const line of message.data.split(LINE_BREAK)) {
    lines.push(`data: ${line}`);
  }

  return lines.join('\n') + '\n\n';
}

/**
 * Comment line - ignored by EventSource, used for keep-alives
 */
export function formatComment(text: string): string {
  return `: ${singleLine(text)}\n\n`;
}

/**
 * Build a message from an arbitrary payload. Strings pass through,
 * anything else is JSON-encoded.
 */
export function toMessage(
  payload: unknown,
  fields: { event?: string; id?: string; retry?: number } = {}
): SseMessage {
  const data = typeof payload === 'string' ? payload : JSON.stringify(payload) ?? '';
  return { ...fields, data };
}
