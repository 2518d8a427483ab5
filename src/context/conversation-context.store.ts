import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import {
  SCRATCH_KEYS,
  type ContextSnapshot,
  type ConversationTurn,
  type Speaker,
} from './context.types';

const POINTER_KEYS: readonly string[] = [
  SCRATCH_KEYS.LAST_USER_UTTERANCE,
  SCRATCH_KEYS.LAST_ASSISTANT_RESPONSE,
  SCRATCH_KEYS.PREVIOUS_USER_UTTERANCE,
  SCRATCH_KEYS.PREVIOUS_ASSISTANT_RESPONSE,
];

function isSpeaker(value: unknown): value is Speaker {
  return value === 'user' || value === 'assistant';
}

/**
 * Short-term conversation memory: a bounded history of turns plus a scratch
 * map for the current turn. Every operation is synchronous.
 */
@Injectable()
export class ConversationContextStore {
  private readonly logger = new Logger(ConversationContextStore.name);
  private readonly maxTurns: number;
  private history: ConversationTurn[] = [];
  private readonly scratch = new Map<string, unknown>();

  constructor(private readonly config: ConfigService) {
    const configured = Number(this.config.get('CONTEXT_HISTORY_SIZE') ?? 20);
    this.maxTurns =
      Number.isInteger(configured) && configured > 0 ? configured : 20;
  }

  get capacity(): number {
    return this.maxTurns;
  }

  get size(): number {
    return this.history.length;
  }

  /**
   * Appends a turn and moves the utterance pointers. Returns the recorded
   * turn, or null when the speaker is not recognised.
   */
  addUtterance(
    speaker: string,
    text: string,
    annotations: Record<string, unknown> = {},
  ): ConversationTurn | null {
    if (!isSpeaker(speaker)) {
      this.logger.warn(`Ignoring utterance from unknown speaker "${speaker}"`);
      return null;
    }

    const turn: ConversationTurn = {
      id: uuidv4(),
      speaker,
      text,
      timestamp: new Date().toISOString(),
      annotations: structuredClone(annotations),
    };
    this.history.push(turn);
    if (this.history.length > this.maxTurns) {
      this.history = this.history.slice(-this.maxTurns);
    }

    if (speaker === 'user') {
      this.shiftPointer(
        SCRATCH_KEYS.LAST_USER_UTTERANCE,
        SCRATCH_KEYS.PREVIOUS_USER_UTTERANCE,
      );
      this.shiftPointer(
        SCRATCH_KEYS.LAST_ASSISTANT_RESPONSE,
        SCRATCH_KEYS.PREVIOUS_ASSISTANT_RESPONSE,
      );
      this.scratch.set(SCRATCH_KEYS.LAST_USER_UTTERANCE, text);
      this.scratch.delete(SCRATCH_KEYS.LAST_ASSISTANT_RESPONSE);
    } else {
      this.scratch.set(SCRATCH_KEYS.LAST_ASSISTANT_RESPONSE, text);
    }

    this.logger.debug(
      `Recorded ${speaker} turn ${turn.id} (${this.history.length}/${this.maxTurns})`,
    );
    return structuredClone(turn);
  }

  getContextForProcessing(): ContextSnapshot {
    const turnData: Record<string, unknown> = {};
    for (const [key, value] of this.scratch) {
      if (!POINTER_KEYS.includes(key)) turnData[key] = value;
    }

    return structuredClone({
      history: this.history,
      lastUserUtterance: this.pointer(SCRATCH_KEYS.LAST_USER_UTTERANCE),
      lastAssistantResponse: this.pointer(SCRATCH_KEYS.LAST_ASSISTANT_RESPONSE),
      previousUserUtterance: this.pointer(SCRATCH_KEYS.PREVIOUS_USER_UTTERANCE),
      previousAssistantResponse: this.pointer(
        SCRATCH_KEYS.PREVIOUS_ASSISTANT_RESPONSE,
      ),
      turnData,
    });
  }

  setCurrentTurnData(key: string, value: unknown): void {
    this.scratch.set(key, structuredClone(value));
  }

  getCurrentTurnData(key: string, defaultValue: unknown = null): unknown {
    return this.scratch.has(key)
      ? structuredClone(this.scratch.get(key))
      : defaultValue;
  }

  /** Empties history and scratch map together; returns the discarded turn count. */
  clearAllContext(): number {
    const discarded = this.history.length;
    this.history = [];
    this.scratch.clear();
    this.logger.log(`Conversation context cleared (${discarded} turns discarded)`);
    return discarded;
  }

  private pointer(key: string): string | null {
    const value = this.scratch.get(key);
    return typeof value === 'string' ? value : null;
  }

  private shiftPointer(from: string, to: string): void {
    if (this.scratch.has(from)) {
      this.scratch.set(to, this.scratch.get(from));
    } else {
      this.scratch.delete(to);
    }
  }
}
