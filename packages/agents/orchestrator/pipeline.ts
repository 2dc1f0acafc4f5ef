// ConversationPipeline: runs a fixed, linear stage sequence per payload
// validate -> stages (merge after each) -> checkpoint -> append run records -> result

import { randomUUID } from 'node:crypto';
import type { EventBus, DomainEventType } from '../types/events.js';
import type {
  ConversationStateBase,
  PipelineDefinition,
  RunRecordBase,
  StatePatch,
} from '../types/pipeline.js';
import type { CheckpointStore, RunRecordStore } from '../memory/conversation-store.js';
import { InvalidRequestError, PipelineError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../types/result.js';
import { KeyedLock } from './keyed-lock.js';
import { mergeState } from './state-merge.js';

export interface ConversationPipelineConfig<S, R extends RunRecordBase> {
  checkpoints: CheckpointStore<S>;
  runStore: RunRecordStore<R>;
  eventBus?: EventBus;
  logger?: Logger;
}

export function newConversationId(): string {
  return `conv-${randomUUID()}`;
}

export class ConversationPipeline<
  P,
  S extends ConversationStateBase<R, Res>,
  R extends RunRecordBase,
  Res,
> {
  private readonly checkpoints: CheckpointStore<S>;
  private readonly runStore: RunRecordStore<R>;
  private readonly eventBus?: EventBus;
  private readonly logger: Logger;
  private readonly lock = new KeyedLock();

  constructor(
    private readonly definition: PipelineDefinition<P, S, R, Res>,
    config: ConversationPipelineConfig<S, R>,
  ) {
    this.checkpoints = config.checkpoints;
    this.runStore = config.runStore;
    this.eventBus = config.eventBus;
    this.logger = (config.logger ?? createLogger('Pipeline')).child(definition.name);
  }

  get name(): string {
    return this.definition.name;
  }

  get stageNames(): string[] {
    return this.definition.stages.map(s => s.name);
  }

  /**
   * Validate and execute one run. Throws InvalidRequestError before any stage
   * runs, or PipelineError when a stage throws; nothing is persisted in either case.
   * Runs sharing a conversation id are serialised.
   */
  async run(raw: unknown): Promise<Res> {
    let payload: P;
    try {
      payload = this.definition.parsePayload(raw);
    } catch (err) {
      if (err instanceof InvalidRequestError) {
        this.logger.warn('Rejected payload', { issues: err.issues });
        this.emit('RunRejected', { issues: err.issues });
      }
      throw err;
    }

    const conversationId = this.definition.conversationIdOf(payload) ?? newConversationId();
    return this.lock.runExclusive(conversationId, () => this.execute(conversationId, payload));
  }

  async getRuns(conversationId: string): Promise<R[]> {
    return this.runStore.list(conversationId);
  }

  async getLatestResult(conversationId: string): Promise<Res | null> {
    const latest = await this.checkpoints.latest(conversationId);
    return latest?.result ?? null;
  }

  async listConversations(): Promise<R[]> {
    return this.runStore.latestPerConversation();
  }

  async getStateHistory(conversationId: string): Promise<S[]> {
    return this.checkpoints.history(conversationId);
  }

  private async execute(conversationId: string, payload: P): Promise<Res> {
    const startTime = Date.now();
    const history = await this.runStore.list(conversationId);
    let state = this.definition.initialState(conversationId, payload, history);

    this.logger.info('Run started', { conversationId, priorRuns: history.length });
    this.emit('RunStarted', { conversationId });

    for (const stage of this.definition.stages) {
      let patch: StatePatch<S>;
      try {
        patch = await stage.run(state);
      } catch (err) {
        this.logger.error('Stage failed', { conversationId, stage: stage.name, error: errorMessage(err) });
        this.emit('RunFailed', { conversationId, stage: stage.name, error: errorMessage(err) });
        if (err instanceof InvalidRequestError) throw err;
        throw new PipelineError(`Stage '${stage.name}' failed: ${errorMessage(err)}`, stage.name, err);
      }

      state = mergeState(state, patch);
      if (state.conversationId !== conversationId) {
        throw new PipelineError(
          `Stage '${stage.name}' changed the conversation id`,
          stage.name,
        );
      }

      this.logger.debug('Stage completed', { conversationId, stage: stage.name });
      this.emit('StageCompleted', { conversationId, stage: stage.name });
    }

    const result = state.result;
    if (result === null) {
      const last = this.definition.stages[this.definition.stages.length - 1];
      throw new PipelineError('Pipeline finished without a result', last?.name ?? 'unknown');
    }

    const newRecords = state.runs.slice(history.length);
    await this.checkpoints.put(conversationId, state);
    await this.runStore.append(conversationId, newRecords);

    const durationMs = Date.now() - startTime;
    this.logger.info('Run completed', { conversationId, durationMs, records: newRecords.length });
    this.emit('RunCompleted', { conversationId, durationMs });

    return result;
  }

  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    this.eventBus?.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      sourceContext: this.definition.name,
      payload,
    });
  }
}
