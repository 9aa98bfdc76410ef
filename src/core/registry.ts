import { logger } from '../middleware/logger.js';
import type { UserInput } from './inbound-event.js';
import { UnknownStateError } from './errors.js';
import { parseSelection } from './selection.js';
import { withValue } from './session.js';
import {
  isAdminKind,
  type ConversationDefinition,
  type ConversationKind,
  type StateRule,
  type StartSignal,
  type StateRuleSpec,
} from './conversation-types.js';

export type StartMatch =
  | { type: 'start'; kind: ConversationKind; signal: StartSignal }
  | { type: 'malformed'; tag: string; reason: string };

/**
 * Declarative lookup of conversation rules, filled once at process start.
 * Registration mistakes throw immediately; a lookup for an unregistered
 * (kind, state) pair throws UnknownStateError.
 */
export class ConversationRegistry {
  private readonly definitions = new Map<ConversationKind, ConversationDefinition>();
  private readonly rules = new Map<string, StateRule>();
  private readonly commands = new Map<string, ConversationKind>();
  private readonly selectionTags = new Map<string, { kind: ConversationKind; arity: readonly number[] }>();

  register(definition: ConversationDefinition): this {
    const { kind } = definition;
    if (this.definitions.has(kind)) {
      throw new Error(`Conversation "${kind}" is already registered`);
    }
    if (!definition.states.some((spec) => spec.state === definition.initialState)) {
      throw new Error(`Conversation "${kind}" has no rule for its initial state "${definition.initialState}"`);
    }

    const rules: StateRule[] = [];
    for (const spec of definition.states) {
      if (spec.terminal && isAdminKind(kind) !== (spec.terminal.type === 'moderate')) {
        throw new Error(
          `State "${spec.state}" of "${kind}": admin conversations must finish through the moderation dispatcher, and only they may`,
        );
      }
      const key = ruleKey(kind, spec.state);
      if (this.rules.has(key) || rules.some((rule) => rule.state === spec.state)) {
        throw new Error(`Conversation "${kind}" declares state "${spec.state}" twice`);
      }
      rules.push(freezeRule(kind, spec));
    }

    for (const command of definition.trigger.commands ?? []) {
      const normalized = command.toLowerCase();
      if (this.commands.has(normalized)) {
        throw new Error(`Command "${command}" is already bound to "${this.commands.get(normalized)}"`);
      }
      this.commands.set(normalized, kind);
    }

    for (const selection of definition.trigger.selections ?? []) {
      const tag = selection.tag.toLowerCase();
      if (this.selectionTags.has(tag)) {
        throw new Error(`Selection tag "${tag}" is already bound`);
      }
      this.selectionTags.set(tag, { kind, arity: selection.arity ?? [0] });
    }

    for (const rule of rules) {
      this.rules.set(ruleKey(kind, rule.state), rule);
    }
    this.definitions.set(kind, definition);
    logger.debug({ kind, states: rules.map((rule) => rule.state) }, 'Conversation registered');
    return this;
  }

  rule(kind: ConversationKind, state: string): StateRule {
    const rule = this.rules.get(ruleKey(kind, state));
    if (!rule) throw new UnknownStateError(kind, state);
    return rule;
  }

  definition(kind: ConversationKind): ConversationDefinition {
    const definition = this.definitions.get(kind);
    if (!definition) throw new UnknownStateError(kind, '(definition)');
    return definition;
  }

  kinds(): ConversationKind[] {
    return [...this.definitions.keys()];
  }

  /** Ordered state names of a conversation. */
  states(kind: ConversationKind): string[] {
    return this.definition(kind).states.map((spec) => spec.state);
  }

  /**
   * Map an input to a "start conversation" signal, if it is one.
   * Slash commands take no parameters; selection tags must match their
   * declared parameter count.
   */
  matchStart(input: UserInput): StartMatch | null {
    if (input.type === 'text') {
      const command = input.text.trim().toLowerCase();
      const kind = this.commands.get(command);
      return kind ? { type: 'start', kind, signal: { tag: null, params: [] } } : null;
    }

    if (input.type === 'selection') {
      const { tag, params } = parseSelection(input.data);
      const binding = this.selectionTags.get(tag);
      if (!binding) return null;
      if (!binding.arity.includes(params.length)) {
        return {
          type: 'malformed',
          tag,
          reason: `expected ${binding.arity.join(' or ')} parameter(s), got ${params.length}`,
        };
      }
      return { type: 'start', kind: binding.kind, signal: { tag, params } };
    }

    return null;
  }
}

function ruleKey(kind: ConversationKind, state: string): string {
  return `${kind}::${state}`;
}

function freezeRule(kind: ConversationKind, spec: StateRuleSpec): StateRule {
  const terminal = spec.terminal ?? null;
  const rule: StateRule = {
    kind,
    state: spec.state,
    prompt: spec.prompt,
    validate: spec.validate,
    apply: spec.apply ?? ((payload, value) => withValue(payload, spec.state, value)),
    next: spec.next,
    skippable: spec.skippable ?? false,
    terminal,
    isMutating: terminal !== null && terminal.type !== 'read',
  };
  return Object.freeze(rule);
}
