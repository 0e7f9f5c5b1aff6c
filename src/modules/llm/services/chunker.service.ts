/**
 * Sentence Chunker
 *
 * Groups streamed model fragments into synthesizable chunks on sentence
 * boundaries. A boundary is a terminator run (. ! ? … or ...) with optional
 * closing quotes or brackets, followed by whitespace; the chunk ends after that
 * whitespace, so joining every chunk and the final flush gives back the input
 * exactly.
 *
 * Boundaries are skipped when the sentence is shorter than minSentenceChars or
 * when a lone "." follows a known abbreviation or a single-letter initial.
 * Decimals ("3.14") never match since the terminator must be followed by
 * whitespace. A missed boundary only delays a chunk; flush releases everything.
 */

import { logger } from '@/shared/utils';
import abbreviationList from '../config/abbreviations.json';
import { streamingConfig } from '../config';
import type { ChunkerOptions } from '../config';

const ABBREVIATIONS: ReadonlySet<string> = new Set(abbreviationList);

const BOUNDARY_PATTERN = /(?:\.{3}|[.!?…])+["'”’)\]]*\s+/g;

export class SentenceChunker {
  private buffer = '';
  // Buffer offset where the current (unfinished) sentence begins
  private sentenceStart = 0;
  // Buffer offset after the last boundary decision; earlier text is never rescanned
  private scanPos = 0;
  private sentencesInChunk = 0;
  private chunkCount = 0;

  constructor(private readonly options: ChunkerOptions = streamingConfig) {}

  /**
   * Append a fragment; returns every chunk completed by it (possibly none)
   */
  feed(fragment: string): string[] {
    if (!fragment) {
      return [];
    }
    this.buffer += fragment;

    const chunks: string[] = [];
    const pattern = new RegExp(BOUNDARY_PATTERN.source, 'g');
    pattern.lastIndex = this.scanPos;

    let match: RegExpExecArray | null;
    while ((match = pattern.exec(this.buffer)) !== null) {
      const end = match.index + match[0].length;
      this.scanPos = end;

      if (!this.isSentenceBoundary(match.index, match[0])) {
        continue;
      }

      this.sentencesInChunk++;
      this.sentenceStart = end;

      if (this.sentencesInChunk >= this.sentencesNeeded()) {
        chunks.push(this.cut(end));
        pattern.lastIndex = 0;
      }
    }

    return chunks;
  }

  /**
   * Release whatever is buffered, regardless of sentence count
   */
  flush(): string {
    const remaining = this.buffer;
    if (remaining.length > 0) {
      this.chunkCount++;
      logger.debug('Flushed final chunk', {
        length: remaining.length,
        preview: remaining.slice(0, streamingConfig.logPreviewLength),
      });
    }
    this.buffer = '';
    this.sentenceStart = 0;
    this.scanPos = 0;
    this.sentencesInChunk = 0;
    return remaining;
  }

  reset(): void {
    this.flush();
    this.chunkCount = 0;
  }

  getChunkCount(): number {
    return this.chunkCount;
  }

  hasPending(): boolean {
    return this.buffer.length > 0;
  }

  private sentencesNeeded(): number {
    return this.chunkCount === 0
      ? this.options.firstChunkSentences
      : this.options.subsequentChunkSentences;
  }

  private cut(end: number): string {
    const chunk = this.buffer.slice(0, end);
    this.buffer = this.buffer.slice(end);
    this.sentenceStart = 0;
    this.scanPos = 0;
    this.sentencesInChunk = 0;
    this.chunkCount++;
    return chunk;
  }

  private isSentenceBoundary(terminatorIndex: number, terminator: string): boolean {
    const sentence = this.buffer.slice(this.sentenceStart, terminatorIndex);
    if (sentence.replace(/\s/g, '').length < this.options.minSentenceChars) {
      return false;
    }

    // Only a single period is ambiguous
    if (!terminator.startsWith('.') || terminator.startsWith('..')) {
      return true;
    }

    const lastWord = sentence.match(/([^\s("'“‘[]+)$/)?.[1];
    if (!lastWord) {
      return true;
    }
    if (/^[A-Z]$/.test(lastWord)) {
      return false;
    }
    return !ABBREVIATIONS.has(lastWord.toLowerCase());
  }
}
