/**
 * History Compressor
 * Bounds stored history by folding older messages into a running summary.
 * Summaries are deterministic: one "role: first sentence" line per dropped message.
 */

import { logger } from '@/shared/utils';
import type { ConversationMessage, ConversationSession } from '@/modules/session';
import type { PromptMessage } from '@/modules/llm';
import { memoryConfig } from '../config';
import type { MemoryConfig } from '../config';

type CompressorOptions = Record<
  keyof Pick<MemoryConfig, 'compressionThreshold' | 'keepRecent' | 'maxLineChars' | 'maxSummaryChars'>,
  number
>;

function firstSentence(text: string): string {
  const collapsed = text.trim().replace(/\s+/g, ' ');
  const match = collapsed.match(/^.*?[.!?…](?=\s|$)/);
  return match ? match[0] : collapsed;
}

export class HistoryCompressor {
  constructor(private readonly options: CompressorOptions = memoryConfig) {}

  /**
   * Compress in place once history exceeds the threshold
   * @returns true if messages were folded into the summary
   */
  compress(session: ConversationSession): boolean {
    const { compressionThreshold, keepRecent } = this.options;
    if (session.messages.length <= compressionThreshold) {
      return false;
    }

    const cutoff = Math.max(0, session.messages.length - keepRecent);
    const dropped = session.messages.slice(0, cutoff);
    session.messages = session.messages.slice(cutoff);

    const digest = dropped.map((message) => this.digestLine(message)).join('\n');
    const combined = session.summary ? `${session.summary}\n${digest}` : digest;
    session.summary = this.capSummary(combined);

    logger.debug('Conversation history compressed', {
      sessionId: session.sessionId,
      dropped: dropped.length,
      kept: session.messages.length,
      summaryLength: session.summary.length,
    });
    return true;
  }

  /**
   * Model input for the session: system instructions (with the summary in
   * front, when there is one) followed by the stored messages
   */
  buildPrompt(session: ConversationSession): PromptMessage[] {
    const system = session.summary
      ? `Summary of the earlier conversation:\n${session.summary}\n\n${session.systemPrompt}`
      : session.systemPrompt;

    return [
      { role: 'system', content: system },
      ...session.messages.map((message) => ({ role: message.role, content: message.content })),
    ];
  }

  private digestLine(message: ConversationMessage): string {
    const line = `${message.role}: ${firstSentence(message.content)}`;
    return line.length > this.options.maxLineChars
      ? `${line.slice(0, this.options.maxLineChars - 1)}…`
      : line;
  }

  // Oldest lines go first
  private capSummary(summary: string): string {
    if (summary.length <= this.options.maxSummaryChars) {
      return summary;
    }
    const lines = summary.split('\n');
    while (lines.length > 1 && lines.join('\n').length > this.options.maxSummaryChars) {
      lines.shift();
    }
    return lines.join('\n').slice(-this.options.maxSummaryChars);
  }
}
