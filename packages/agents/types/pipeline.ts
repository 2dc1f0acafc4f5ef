// Conversation pipeline contracts shared by the finance assistant and the call summarizer

/** Immutable summary of one completed run, appended to conversation history */
export interface RunRecordBase {
  readonly at: string;               // ISO-8601, assigned at finalize
  readonly conversationId: string;
}

/**
 * Fields every conversation state carries.
 * `runs` is the only append-only field; everything else is last-write-wins.
 */
export interface ConversationStateBase<R extends RunRecordBase, Res> {
  conversationId: string;
  result: Res | null;
  runs: R[];
}

/** Partial state produced by one stage. Absent (or undefined) fields are left untouched. */
export type StatePatch<S> = Partial<S>;

export interface Stage<S> {
  readonly name: string;
  run(state: S): Promise<StatePatch<S>>;
}

export interface PipelineDefinition<
  P,
  S extends ConversationStateBase<R, Res>,
  R extends RunRecordBase,
  Res,
> {
  readonly name: string;
  /** Validate a caller payload. Throws InvalidRequestError before any stage runs. */
  parsePayload(raw: unknown): P;
  /** Conversation id supplied by the caller, if any */
  conversationIdOf(payload: P): string | undefined;
  /** Fresh state for one run; `history` seeds the append-only `runs` field */
  initialState(conversationId: string, payload: P, history: readonly R[]): S;
  readonly stages: ReadonlyArray<Stage<S>>;
}
