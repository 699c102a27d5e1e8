// In-memory session state, one ConversationState per session key.
// Durable storage lives outside this process; checkpoint/restore hand over bytes.

import { v4 as uuidv4 } from 'uuid';
import {
  ContextDecayConfig,
  ConversationState,
  DEFAULT_CONTEXT_DECAY,
  TurnInput,
  UsageRecordResult
} from '../types';
import { applyTurn, createInitialState, recordTellings } from '../engines/conversation-state';
import { KeyedLock } from '../utils/keyed-lock';
import { InputValidationError, describeError } from '../utils/errors';
import { validateContextDecay, validateConversationState, validateTurnInput } from '../utils/validation';

export function serialize(state: ConversationState): Buffer {
  return Buffer.from(JSON.stringify(state), 'utf8');
}

export function deserialize(bytes: Buffer | Uint8Array | string): ConversationState {
  const text = typeof bytes === 'string' ? bytes : Buffer.from(bytes).toString('utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InputValidationError('Serialized state is not valid JSON', [describeError(error)]);
  }

  return validateConversationState(raw);
}

export class ConversationStateStore {
  private sessions: Map<string, ConversationState> = new Map();
  private lock = new KeyedLock();
  private defaultDecay: ContextDecayConfig;

  constructor(defaultDecay: ContextDecayConfig = DEFAULT_CONTEXT_DECAY) {
    this.defaultDecay = validateContextDecay(defaultDecay);
  }

  async getOrCreate(sessionKey: string): Promise<ConversationState> {
    return structuredClone(this.ensureSession(sessionKey));
  }

  async getState(sessionKey: string): Promise<ConversationState | null> {
    const state = this.sessions.get(sessionKey);
    return state ? structuredClone(state) : null;
  }

  async updateTurn(sessionKey: string, input: TurnInput): Promise<ConversationState> {
    // Validate before queueing so a bad payload never touches the session
    const turn = validateTurnInput(input);

    return this.lock.run(sessionKey, () => {
      const next = applyTurn(this.ensureSession(sessionKey), turn);
      this.sessions.set(sessionKey, next);
      return structuredClone(next);
    });
  }

  async recordStoryUsage(sessionKey: string, storyId: string): Promise<UsageRecordResult> {
    return this.recordStoryUsages(sessionKey, [storyId]);
  }

  /**
   * Appends every id (once) at the session's current turn, all or nothing.
   * An aborted signal means nothing is written.
   */
  async recordStoryUsages(sessionKey: string, storyIds: string[], signal?: AbortSignal): Promise<UsageRecordResult> {
    if (storyIds.some(id => id.trim() === '')) {
      throw new InputValidationError('Story ids must be non-empty');
    }

    return this.lock.run<UsageRecordResult>(sessionKey, () => {
      if (signal?.aborted) {
        return { recorded: false, reason: 'cancelled' };
      }

      const state = this.sessions.get(sessionKey);
      if (!state) {
        return { recorded: false, reason: 'no_such_session' };
      }

      const next = recordTellings(state, storyIds);
      this.sessions.set(sessionKey, next);

      const recordedIds = next.retrievedStoryHistory
        .slice(state.retrievedStoryHistory.length)
        .map(telling => telling.storyId);
      return { recorded: true, toldAtTurn: next.turnCount, storyIds: recordedIds };
    });
  }

  async reset(sessionKey: string): Promise<boolean> {
    return this.lock.run(sessionKey, () => {
      const existed = this.sessions.delete(sessionKey);
      if (existed) {
        console.log(`🗑️  Cleared conversation state: ${sessionKey}`);
      }
      return existed;
    });
  }

  async reconfigure(sessionKey: string, changes: Partial<ContextDecayConfig>): Promise<ConversationState | null> {
    return this.lock.run(sessionKey, () => {
      const state = this.sessions.get(sessionKey);
      if (!state) return null;

      const contextDecay = validateContextDecay({ ...state.contextDecay, ...changes });
      const next = { ...state, contextDecay };
      this.sessions.set(sessionKey, next);
      return structuredClone(next);
    });
  }

  async checkpoint(sessionKey: string): Promise<Buffer | null> {
    return this.lock.run(sessionKey, () => {
      const state = this.sessions.get(sessionKey);
      return state ? serialize(state) : null;
    });
  }

  async restore(sessionKey: string, bytes: Buffer | Uint8Array | string): Promise<ConversationState> {
    const state = deserialize(bytes);

    return this.lock.run(sessionKey, () => {
      this.sessions.set(sessionKey, state);
      console.log(`📚 Restored conversation state: ${sessionKey} (turn ${state.turnCount})`);
      return structuredClone(state);
    });
  }

  private ensureSession(sessionKey: string): ConversationState {
    const existing = this.sessions.get(sessionKey);
    if (existing) return existing;

    const state = createInitialState(uuidv4(), this.defaultDecay);
    this.sessions.set(sessionKey, state);
    console.log(`💬 Created conversation state: ${sessionKey}`);
    return state;
  }
}
