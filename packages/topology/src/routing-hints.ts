/**
 * Routing Hints
 *
 * Keyword → target overrides for phrasings the taxonomy leaves ambiguous
 * (payroll reads as Finance, training reads as Learning & Development).
 * These are configuration, not derived logic. A hint whose target is not
 * among the dispatcher's children is dropped when the instruction is rendered.
 */

import type { TopologyKind } from '@routebench/types';

export interface RoutingHint {
    /** Phrases as they are shown to the dispatcher */
    phrases: readonly string[];
    /** Child identifier the phrases resolve to */
    target: string;
}

/** Hints applied at the root dispatcher of each topology kind */
export const ROUTING_HINTS: Record<TopologyKind, readonly RoutingHint[]> = {
    'flat-domain': [
        { phrases: ['expense', 'payment', 'spending', 'report cost'], target: 'finance_agent' },
        { phrases: ['when do I get paid', 'paycheck', 'salary inquiry'], target: 'hr_agent' },
        { phrases: ['training', 'enroll in course', 'enroll in program'], target: 'hr_agent' },
        { phrases: ['travel', 'flight', 'hotel', 'vacation', 'trip'], target: 'travel_agent' },
        { phrases: ['order', 'return', 'refund', 'delivery'], target: 'customer_service_agent' },
    ],
    'two-level': [
        { phrases: ['expense', 'payment', 'spending', 'report cost'], target: 'finance_domain' },
        { phrases: ['when do I get paid', 'paycheck', 'salary inquiry'], target: 'hr_domain' },
        { phrases: ['training', 'enroll in course', 'enroll in program'], target: 'hr_domain' },
        { phrases: ['travel', 'flight', 'hotel', 'vacation', 'trip'], target: 'travel_domain' },
        { phrases: ['order', 'return', 'refund', 'delivery'], target: 'customer_service_domain' },
    ],
    'flat-leaf': [
        { phrases: ['expense', 'spending', 'report cost', 'reimbursement'], target: 'finance_expenses' },
        { phrases: ['when do I get paid', 'paycheck', 'salary inquiry'], target: 'hr_payroll' },
        { phrases: ['training', 'enroll in course', 'enroll in program'], target: 'hr_training' },
        { phrases: ['flight', 'airline'], target: 'travel_flights' },
        { phrases: ['hotel', 'resort'], target: 'travel_hotels' },
        { phrases: ['order', 'delivery'], target: 'customer_service_orders' },
        { phrases: ['return', 'refund'], target: 'customer_service_returns' },
    ],
};
