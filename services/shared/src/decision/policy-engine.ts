import { PolicyConfig, RuleConfig } from '../config/config';
import {
     DECISION_OUTCOMES,
     Decision,
     DecisionOutcome,
     FLAG_REASONS,
     FlagReason,
     ShrinkFlag,
} from '../types/inventory.types';
import { ConfigMissingError } from '../utils/errors';
import { Logger, createChildLogger } from '../utils/logger';

export interface CompiledRule {
     readonly reason: FlagReason;
     readonly outcome: DecisionOutcome;
     readonly source: RuleConfig;
     matches(flag: ShrinkFlag): boolean;
     build(flag: ShrinkFlag): Decision;
}

/**
 * Days a flag is past its threshold: how far inside the expiry window, or how
 * many days of supply above the ceiling. Low movement has no such measure.
 */
export function excessDays(flag: ShrinkFlag): number {
     switch (flag.reason) {
          case 'near_expiry':
               return Math.max(0, flag.metrics.expiryThresholdDays - flag.metrics.daysUntilExpiry);
          case 'overstock':
               return Math.max(0, flag.metrics.daysOfSupply - flag.metrics.maxDaysOfSupply);
          case 'low_movement':
               return 0;
     }
}

export function markdownPct(rule: RuleConfig, flag: ShrinkFlag): number | null {
     if (rule.outcome !== 'MARKDOWN' || !rule.markdown) {
          return null;
     }
     const { basePct, incrementPct, maxPct } = rule.markdown;
     const pct = Math.min(maxPct, basePct + excessDays(flag) * incrementPct);
     return Math.round(pct * 100) / 100;
}

export function suggestedQuantity(rule: RuleConfig, flag: ShrinkFlag): number {
     if (rule.outcome === 'NONE') {
          return 0;
     }
     const onHand = flag.metrics.quantityOnHand;
     switch (rule.suggestedQty.kind) {
          case 'on_hand':
               return onHand;
          case 'fixed':
               return rule.suggestedQty.quantity;
          case 'excess_supply':
               if (flag.reason !== 'overstock') {
                    return onHand;
               }
               return Math.max(0, Math.ceil(onHand - flag.metrics.avgDailySales * flag.metrics.maxDaysOfSupply));
     }
}

function compileRule(rule: RuleConfig): CompiledRule {
     return Object.freeze({
          reason: rule.reason,
          outcome: rule.outcome,
          source: rule,
          matches(flag: ShrinkFlag): boolean {
               if (flag.reason !== rule.reason) {
                    return false;
               }
               if (rule.categories && !rule.categories.includes(flag.category)) {
                    return false;
               }
               if (rule.excludeCategories && rule.excludeCategories.includes(flag.category)) {
                    return false;
               }
               return rule.perishable === undefined || rule.perishable === flag.perishable;
          },
          build(flag: ShrinkFlag): Decision {
               return {
                    productCode: flag.product,
                    outcome: rule.outcome,
                    reason: flag.reason,
                    reasons: [flag.reason],
                    lot: flag.lots[0] ?? null,
                    suggestedQty: suggestedQuantity(rule, flag),
                    markdownPct: markdownPct(rule, flag),
                    notes: rule.notes,
               };
          },
     });
}

/**
 * Category-scoped rules first, each group in table order.
 */
export function compileRules(policy: PolicyConfig): readonly CompiledRule[] {
     const scoped = policy.rules.filter((rule) => rule.categories !== undefined);
     const unscoped = policy.rules.filter((rule) => rule.categories === undefined);
     return Object.freeze([...scoped, ...unscoped].map(compileRule));
}

function outcomeRank(decision: Decision): number {
     return DECISION_OUTCOMES.indexOf(decision.outcome);
}

function reasonRank(decision: Decision): number {
     return decision.reason === null ? FLAG_REASONS.length : FLAG_REASONS.indexOf(decision.reason);
}

/** Negative when `a` should win over `b`. */
export function compareDecisions(a: Decision, b: Decision): number {
     return outcomeRank(a) - outcomeRank(b) || reasonRank(a) - reasonRank(b);
}

export class DecisionPolicyEngine {
     private readonly rules: readonly CompiledRule[];
     private readonly log: Logger;

     constructor(policy: PolicyConfig, logger?: Logger) {
          this.rules = compileRules(policy);
          this.log = logger ?? createChildLogger({ component: 'decision-policy' });
     }

     get ruleCount(): number {
          return this.rules.length;
     }

     ruleFor(flag: ShrinkFlag): CompiledRule | undefined {
          return this.rules.find((rule) => rule.matches(flag));
     }

     decideFlag(flag: ShrinkFlag): Decision {
          const rule = this.ruleFor(flag);
          if (rule) {
               return rule.build(flag);
          }

          const missing = new ConfigMissingError(flag.reason, flag.category);
          this.log.warn({ err: missing, product: flag.product }, 'No decision rule matched flag');
          return {
               productCode: flag.product,
               outcome: 'NONE',
               reason: flag.reason,
               reasons: [flag.reason],
               lot: flag.lots[0] ?? null,
               suggestedQty: 0,
               markdownPct: null,
               notes: '',
          };
     }

     /**
      * Exactly one decision per flagged product: highest outcome priority
      * wins, then reason order. Result is ordered by product code.
      */
     decide(flags: readonly ShrinkFlag[]): Decision[] {
          const byProduct = new Map<string, Decision[]>();
          for (const flag of flags) {
               const candidates = byProduct.get(flag.product) ?? [];
               candidates.push(this.decideFlag(flag));
               byProduct.set(flag.product, candidates);
          }

          const decisions: Decision[] = [];
          for (const [, candidates] of [...byProduct].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
               const [winner] = [...candidates].sort(compareDecisions);
               const reasons = FLAG_REASONS.filter((reason) =>
                    candidates.some((candidate) => candidate.reason === reason)
               );
               decisions.push({ ...winner, reasons });
          }
          return decisions;
     }
}
