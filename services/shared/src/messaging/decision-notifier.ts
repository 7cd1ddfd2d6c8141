import { FlaggedDecisionRecord } from '../types/inventory.types';
import { INVENTORY_EVENTS_EXCHANGE, publishEvent } from './client';

export const DECISIONS_PUBLISHED_ROUTING_KEY = 'inventory.DecisionsPublished';

export interface DecisionNotifier {
     decisionsPublished(records: readonly FlaggedDecisionRecord[], publishedAt: Date): Promise<void>;
}

/**
 * Announces a freshly published artifact on the inventory events exchange.
 * The message carries counts per outcome, not the decisions themselves.
 */
export class AmqpDecisionNotifier implements DecisionNotifier {
     async decisionsPublished(records: readonly FlaggedDecisionRecord[], publishedAt: Date): Promise<void> {
          const outcomes: Record<string, number> = {};
          for (const record of records) {
               outcomes[record.outcome] = (outcomes[record.outcome] ?? 0) + 1;
          }

          await publishEvent(INVENTORY_EVENTS_EXCHANGE, DECISIONS_PUBLISHED_ROUTING_KEY, {
               type: 'DecisionsPublished',
               publishedAt: publishedAt.toISOString(),
               total: records.length,
               outcomes,
               products: records.map((record) => record.default_code),
          });
     }
}

export function createDecisionNotifier(): DecisionNotifier | undefined {
     return process.env.NOTIFY_DECISIONS === 'true' ? new AmqpDecisionNotifier() : undefined;
}
