/**
 * Stable identifier of the actor a session belongs to. Chat-platform ids are
 * 64-bit, so they are carried as decimal strings.
 */
export type OwnerKey = string;

/**
 * Session record held by a {@link SessionStore}. Two-party sessions list both
 * owners and are reachable from either.
 */
export type StoredSession<TPayload> = {
  id: string;
  kind: string;
  owners: OwnerKey[];
  payload: TPayload;
  createdAt: number;
  updatedAt: number;
};

/**
 * Result of a mutation function. `terminal` removes the session for every
 * owner in the same critical section that applied the new payload.
 */
export type Mutation<TPayload, TOutcome> = {
  payload: TPayload;
  outcome: TOutcome;
  terminal?: boolean;
};

export type MutateFn<TPayload, TOutcome> = (
  payload: TPayload,
  session: Readonly<StoredSession<TPayload>>,
) => Mutation<TPayload, TOutcome>;

/**
 * Registry contract for per-owner session state.
 */
export interface SessionStore<TPayload> {
  start(owners: readonly OwnerKey[], kind: string, payload: TPayload): Promise<StoredSession<TPayload>>;
  get(owner: OwnerKey, kind: string): Promise<StoredSession<TPayload> | null>;
  mutate<TOutcome>(owner: OwnerKey, kind: string, fn: MutateFn<TPayload, TOutcome>): Promise<TOutcome>;
  end(owner: OwnerKey, kind: string): Promise<TPayload | null>;
  size(): number;
  close?(): Promise<void>;
}
