/**
 * Conversation Context
 * Folds recent chat turns into the text the pipeline retrieves with, so that
 * follow-up questions ("what about the second one?") still find passages.
 */

import type { ConversationMessage } from '../types';

/** Context only kicks in once a conversation has more than this many messages */
const MIN_HISTORY = 2;
const MAX_CONTEXT_MESSAGES = 5;

export function buildContextualQuery(
  query: string,
  history: readonly ConversationMessage[] = [],
): string {
  if (history.length <= MIN_HISTORY) {
    return query;
  }

  const recent = history
    .filter((message) => message.role !== 'system')
    .slice(-MAX_CONTEXT_MESSAGES);

  if (recent.length === 0) {
    return query;
  }

  const context = recent
    .map((message) => `${message.role}: ${message.content}`)
    .join('\n');

  return `Conversation context:\n${context}\n\nCurrent query: ${query}`;
}
