import { ConfidenceStrategy } from '../config';
import { AnswerUnavailableError, InvalidQueryError, describeError } from '../errors';
import { LlmClient } from '../llm/client';
import { ANSWER_SYSTEM_PROMPT } from '../llm/prompts';
import { AnswerResult, Confidence, RetrievedChunk } from '../rag/schema';
import { withTimeout } from '../util/timeout';

export const INSUFFICIENT_CONTEXT_ANSWER =
  'Insufficient context: no indexed CV passages matched this question, so no answer can be given.';

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

export type SynthesizerOptions = {
  maxContextChars: number;
  highThreshold: number;
  lowThreshold: number;
  strategy: ConfidenceStrategy;
  timeoutMs: number;
};

export type ContextBlock = {
  context: string;
  included: RetrievedChunk[];
};

const formatEntry = (chunk: RetrievedChunk, text: string = chunk.text): string =>
  `[${chunk.candidateName} - ${chunk.section}]\n${text}\n(Relevance: ${chunk.score.toFixed(2)})`;

/**
 * Packs chunks, best first, into at most `maxChars` characters. An oversized
 * first entry is truncated; packing stops at the first later entry that does
 * not fit.
 */
export const buildContext = (chunks: readonly RetrievedChunk[], maxChars: number): ContextBlock => {
  const ordered = [...chunks].sort((a, b) => b.score - a.score);
  const entries: string[] = [];
  const included: RetrievedChunk[] = [];
  let length = 0;

  for (const chunk of ordered) {
    const separator = entries.length ? CONTEXT_SEPARATOR.length : 0;
    let entry = formatEntry(chunk);

    if (length + separator + entry.length > maxChars) {
      if (entries.length) {
        break;
      }

      const overflow = entry.length - maxChars;
      entry = formatEntry(chunk, chunk.text.slice(0, Math.max(0, chunk.text.length - overflow))).slice(0, maxChars);
    }

    entries.push(entry);
    included.push(chunk);
    length += separator + entry.length;
  }

  return { context: entries.join(CONTEXT_SEPARATOR), included };
};

export const confidenceFor = (
  scores: readonly number[],
  { highThreshold, lowThreshold, strategy }: Pick<SynthesizerOptions, 'highThreshold' | 'lowThreshold' | 'strategy'>,
): Confidence => {
  if (!scores.length) {
    return 'low';
  }

  const score =
    strategy === 'top1' ? Math.max(...scores) : scores.reduce((sum, value) => sum + value, 0) / scores.length;

  if (score >= highThreshold) {
    return 'high';
  }

  return score >= lowThreshold ? 'medium' : 'low';
};

export class AnswerSynthesizer {
  constructor(
    private readonly llm: LlmClient,
    private readonly options: SynthesizerOptions,
  ) {}

  async answer(question: string, chunks: readonly RetrievedChunk[]): Promise<AnswerResult> {
    const query = question.trim();

    if (!query) {
      throw new InvalidQueryError('Question must not be empty.');
    }

    if (!chunks.length) {
      return { answer: INSUFFICIENT_CONTEXT_ANSWER, sources: [], confidence: 'low' };
    }

    const { context, included } = buildContext(chunks, this.options.maxContextChars);
    const { timeoutMs } = this.options;

    let answer: string;

    try {
      answer = await withTimeout(
        (signal) => this.llm.complete(ANSWER_SYSTEM_PROMPT, context, query, signal),
        timeoutMs,
        () => new AnswerUnavailableError(`Answer generation timed out after ${timeoutMs}ms.`),
      );
    } catch (error) {
      if (error instanceof AnswerUnavailableError) {
        throw error;
      }

      console.error(`Answer generation failed: ${describeError(error)}`);
      throw new AnswerUnavailableError(`Answer generation failed: ${describeError(error)}`, error);
    }

    return {
      answer,
      sources: included.map((chunk) => ({
        chunkId: chunk.chunkId,
        candidateId: chunk.candidateId,
        candidateName: chunk.candidateName,
        section: chunk.section,
        score: chunk.score,
      })),
      confidence: confidenceFor(
        included.map((chunk) => chunk.score),
        this.options,
      ),
    };
  }
}
