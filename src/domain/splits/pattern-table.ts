import type { DetectedEvent } from './detected-event.js';
import { DetectedEvents } from './detected-event.js';
import type { Milestone, SoftState } from './milestones.js';
import { rankOf } from './milestones.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * A single line-match rule. Rules are tagged variants so that evaluation
 * order is decided by the table, not by whatever regex engine quirks apply.
 */
export type PatternRule =
  | { readonly kind: 'reset'; readonly pattern: RegExp }
  | { readonly kind: 'advance'; readonly milestone: Milestone; readonly pattern: RegExp }
  | { readonly kind: 'display'; readonly state: SoftState; readonly pattern: RegExp };

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const advancement = (title: string): RegExp =>
  new RegExp(`has made the advancement \\[${escapeRegExp(title)}\\]`);

/**
 * Vanilla server-thread log lines.
 *
 * `first_portal` has no log line of its own; it only arrives from the
 * snapshot source.
 */
export const DEFAULT_PATTERN_RULES: readonly PatternRule[] = [
  { kind: 'reset', pattern: /Loaded \d+ advancements/ },
  { kind: 'reset', pattern: /Preparing start region for dimension minecraft:overworld/ },
  { kind: 'advance', milestone: 'nether', pattern: advancement('We Need to Go Deeper') },
  { kind: 'advance', milestone: 'bastion', pattern: advancement('Those Were the Days') },
  { kind: 'advance', milestone: 'fortress', pattern: advancement('A Terrible Fortress') },
  { kind: 'advance', milestone: 'stronghold', pattern: advancement('Eye Spy') },
  { kind: 'advance', milestone: 'end', pattern: advancement('The End?') },
  { kind: 'advance', milestone: 'finish', pattern: advancement('Free the End') },
  { kind: 'display', state: 'stronghold_search', pattern: advancement('Into Fire') },
];

function priorityOf(rule: PatternRule): number {
  switch (rule.kind) {
    case 'reset':
      return 0;
    case 'advance':
      return 1 + rankOf(rule.milestone);
    case 'display':
      return 1_000;
    default:
      return assertNever(rule);
  }
}

/**
 * Ordered, first-match-wins line classifier.
 *
 * Rules are stably sorted into reset, advance (split order), display, so a
 * line matching a reset rule is never read as a milestone line regardless of
 * the order the rules were supplied in.
 */
export class PatternTable {
  private readonly rules: readonly PatternRule[];

  constructor(rules: readonly PatternRule[] = DEFAULT_PATTERN_RULES) {
    this.rules = [...rules]
      .map((rule, index) => ({ rule, index }))
      .sort((a, b) => priorityOf(a.rule) - priorityOf(b.rule) || a.index - b.index)
      .map(({ rule }) => rule);
  }

  get size(): number {
    return this.rules.length;
  }

  match(line: string, observedAtMs: number): DetectedEvent | null {
    const rule = this.rules.find((r) => r.pattern.test(line));
    if (!rule) return null;

    switch (rule.kind) {
      case 'reset':
        return DetectedEvents.reset('stream', observedAtMs);
      case 'advance':
        return DetectedEvents.streamAdvance(rule.milestone, observedAtMs);
      case 'display':
        return DetectedEvents.display(rule.state, observedAtMs);
      default:
        return assertNever(rule);
    }
  }
}
