/**
 * Round table: every participant answers the same conversation independently,
 * then the chairman synthesizes the answers that came back.
 *
 * Participants run concurrently and are joined before the chairman starts.
 * Results are ordered by the roster, not by completion time.
 */

import { chairmanLabel, createMessage } from './chat-session.js';
import type { CompletionEngine } from './completion.js';
import { ConfigurationError, RoundTableError, errorMessage, type ParticipantFailure } from './errors.js';
import type { EventSink, Message, ModelRef, Participant, RoundTableConfig } from './types.js';

export const PARTICIPANT_INSTRUCTION =
  'You are participating in a round table discussion with other AI models. ' +
  "Provide your perspective on the user's query.";

export const CHAIRMAN_INSTRUCTION =
  'You are the chairman of a round table discussion. ' +
  'Review the perspectives from other AI models and provide a comprehensive summary that ' +
  'highlights key insights, areas of agreement and disagreement, and your own judgment on the matter.';

export const NO_PARTICIPANTS = 'No models configured for round table. Please add models first.';
export const NO_CHAIRMAN = 'No chairman model selected for round table. Please select a chairman.';

export interface ParticipantResponse {
  name: string;
  content: string;
}

export interface CollectResult {
  responses: ParticipantResponse[];
  failures: ParticipantFailure[];
}

export interface RoundTableOutcome extends CollectResult {
  chairman: { label: string; content: string };
}

export function participantSystemPrompt(system: string): string {
  return `${system}\n\n${PARTICIPANT_INSTRUCTION}`;
}

export function chairmanSystemPrompt(system: string): string {
  return `${system}\n\n${CHAIRMAN_INSTRUCTION}`;
}

/**
 * Chairman context: the user's turns only, then one message carrying every
 * participant answer. Assistant turns from earlier rounds are left out.
 */
export function buildChairmanMessages(
  messages: readonly Message[],
  responses: readonly ParticipantResponse[],
): Message[] {
  let context = 'Here are the responses from the round table participants:\n\n';
  for (const { name, content } of responses) {
    context += `=== ${name} ===\n${content}\n\n`;
  }
  context += 'Please synthesize these perspectives and provide your final summary as the chairman.';

  return [...messages.filter((m) => m.role === 'user'), createMessage('user', context)];
}

export class RoundTable {
  private engine: CompletionEngine;
  private emit: EventSink;

  constructor(engine: CompletionEngine, options?: { onEvent?: EventSink }) {
    this.engine = engine;
    this.emit = options?.onEvent ?? (() => {});
  }

  /**
   * Ask every participant concurrently. Fails only when nobody answered.
   */
  async collect(
    participants: readonly Participant[],
    messages: readonly Message[],
    system: string,
    temperature: number,
  ): Promise<CollectResult> {
    if (participants.length === 0) {
      throw new ConfigurationError(NO_PARTICIPANTS);
    }
    const sys = participantSystemPrompt(system);

    const settled = await Promise.allSettled(
      participants.map(async (p) => {
        try {
          const content = await this.engine.getCompletion(p.provider, p.model, messages, sys, temperature);
          this.emit('participant:done', { message: `Got response from ${p.name}...`, participant: p.name });
          return content;
        } catch (err) {
          this.emit('participant:failed', {
            message: `Error getting completion from ${p.name}: ${errorMessage(err)}`,
            participant: p.name,
          });
          throw err;
        }
      }),
    );

    const responses: ParticipantResponse[] = [];
    const failures: ParticipantFailure[] = [];
    settled.forEach((result, i) => {
      const name = participants[i].name;
      if (result.status === 'fulfilled') {
        responses.push({ name, content: result.value });
      } else {
        failures.push({ name, message: errorMessage(result.reason) });
      }
    });

    if (responses.length === 0) {
      throw new RoundTableError(failures);
    }
    return { responses, failures };
  }

  async summarize(
    chairman: ModelRef,
    messages: readonly Message[],
    system: string,
    responses: readonly ParticipantResponse[],
    temperature: number,
  ): Promise<string> {
    this.emit('chairman:start', { message: "Waiting for chairman's summary...", model: chairman.model });
    return this.engine.getCompletion(
      chairman.provider,
      chairman.model,
      buildChairmanMessages(messages, responses),
      chairmanSystemPrompt(system),
      temperature,
    );
  }

  async run(
    config: RoundTableConfig,
    messages: readonly Message[],
    system: string,
    temperature: number,
  ): Promise<RoundTableOutcome> {
    if (config.participants.length === 0) {
      throw new ConfigurationError(NO_PARTICIPANTS);
    }
    const chairman = config.chairman;
    if (!chairman) {
      throw new ConfigurationError(NO_CHAIRMAN);
    }

    const { responses, failures } = await this.collect(config.participants, messages, system, temperature);
    const content = await this.summarize(chairman, messages, system, responses, temperature);
    return { responses, failures, chairman: { label: chairmanLabel(chairman), content } };
  }
}
