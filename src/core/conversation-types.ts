import type { Result } from '../utils/formatting.js';
import type { MarketplaceStore } from '../utils/db-backend.js';
import type { AuditDetail } from '../utils/db-types.js';
import type { UserInput } from './inbound-event.js';
import type { OutboundAction, Prompt } from './outbound-action.js';
import type { Principal } from './principals.js';
import type { ModerationAction, ModerationTargetType } from './permissions.js';
import type { JsonValue, Payload, SessionStore } from './session.js';

export const CONVERSATION_KINDS = [
  'listing-create',
  'listing-edit',
  'search',
  'messaging',
  'listing-delete',
  'review-create',
  'profile-edit',
  'admin-block',
  'admin-warn',
  'admin-flag',
  'admin-delete',
  'admin-edit',
  'admin-review-delete',
  'admin-filter',
] as const;

export type ConversationKind = (typeof CONVERSATION_KINDS)[number];

const ADMIN_KINDS: ReadonlySet<ConversationKind> = new Set<ConversationKind>([
  'admin-block',
  'admin-warn',
  'admin-flag',
  'admin-delete',
  'admin-edit',
  'admin-review-delete',
  'admin-filter',
]);

export function isAdminKind(kind: ConversationKind): boolean {
  return ADMIN_KINDS.has(kind);
}

/** Successor returned by a state's rule when the conversation is over. */
export const TERMINAL = Symbol('terminal');
export type NextState = string | typeof TERMINAL;

export interface EngineSettings {
  minPrice: number;
  maxPrice: number;
  maxPhotos: number;
  minTitleLength: number;
  maxTitleLength: number;
  maxDescriptionLength: number;
  maxMessageLength: number;
  searchPageSize: number;
  currencySymbol: string;
  /** Upper bound for every data store call. */
  storeTimeoutMs: number;
  /** Sessions idle longer than this are treated as absent. 0 disables expiry. */
  sessionTtlMs: number;
}

/** What a rule may look at while validating or committing. */
export interface RuleContext {
  principal: Principal;
  store: MarketplaceStore;
  sessions: SessionStore;
  settings: EngineSettings;
  now: number;
}

export type Validation = Result<JsonValue>;

/**
 * Plan for a moderation mutation. The controller hands it to the
 * moderation dispatcher, which checks permission, runs `mutate`, then
 * writes the audit entry.
 */
export interface ModerationPlan<T = unknown> {
  action: ModerationAction;
  targetType: ModerationTargetType;
  targetId: number | null;
  detail: AuditDetail;
  mutate(store: MarketplaceStore): Promise<T>;
  /** Actions to emit once the mutation (and its audit entry) went through. */
  onApplied(value: T): OutboundAction[];
}

/** Identity helper so `onApplied` is typed from what `mutate` resolves to. */
export function moderationPlan<T>(plan: ModerationPlan<T>): ModerationPlan<T> {
  return plan;
}

/**
 * What happens when a state's successor is TERMINAL:
 * - `commit`: non-admin write straight to the data store.
 * - `moderate`: admin write routed through the moderation dispatcher.
 *   Returning null means the principal declined and nothing is written.
 * - `read`: read-only dispatch, e.g. running a search.
 */
export type TerminalEffect =
  | { type: 'commit'; run(payload: Payload, ctx: RuleContext): Promise<OutboundAction[]> }
  | { type: 'moderate'; plan(payload: Payload, ctx: RuleContext): ModerationPlan<unknown> | null; declined?: string }
  | { type: 'read'; run(payload: Payload, ctx: RuleContext): Promise<OutboundAction[]> };

export interface StateRuleSpec {
  state: string;
  prompt(payload: Payload, ctx: RuleContext): Prompt;
  validate(input: UserInput, payload: Payload, ctx: RuleContext): Validation | Promise<Validation>;
  /** Defaults to storing the value under the state name. */
  apply?(payload: Payload, value: JsonValue): Payload;
  next(payload: Payload): NextState;
  /** Accept an explicit "skip": advance without setting this state's key. */
  skippable?: boolean;
  /** Required on states whose `next` can return TERMINAL. */
  terminal?: TerminalEffect;
}

/** Immutable rule as held by the registry. */
export interface StateRule extends Readonly<Required<Omit<StateRuleSpec, 'terminal' | 'skippable'>>> {
  readonly kind: ConversationKind;
  readonly skippable: boolean;
  readonly terminal: TerminalEffect | null;
  /** True only for terminal rules that write to external storage. */
  readonly isMutating: boolean;
}

export type StartResult = Result<{ state: string; payload: Payload }>;

/** A selection tag that starts a conversation, e.g. `admin_flag` for `admin_flag:123`. */
export interface SelectionTrigger {
  tag: string;
  /** Allowed parameter counts. Defaults to [0]. */
  arity?: readonly number[];
}

/** How a conversation is started from a command or a selection tag. */
export interface ConversationTrigger {
  /** Slash commands, matched case-insensitively. */
  commands?: string[];
  selections?: SelectionTrigger[];
}

/** The signal that opened a conversation. `tag` is null for slash commands. */
export interface StartSignal {
  tag: string | null;
  params: readonly string[];
}

export interface ConversationDefinition {
  kind: ConversationKind;
  initialState: string;
  trigger: ConversationTrigger;
  states: StateRuleSpec[];
  /**
   * Resolve the starting state and seed payload from the start signal.
   * Defaults to the initial state with an empty payload.
   */
  start?(signal: StartSignal, ctx: RuleContext): Promise<StartResult>;
}
