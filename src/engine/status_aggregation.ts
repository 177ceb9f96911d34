import type { OverallStatus, RuleOutcome } from '../types/verification_types';

/**
 * FAIL beats WARN beats PASS. A person with no outcomes at all is never
 * VERIFIED: nothing was actually checked.
 */
export function aggregateStatus(outcomes: readonly Pick<RuleOutcome, 'status'>[]): OverallStatus {
    if (outcomes.some(o => o.status === 'FAIL')) return 'REJECTED';
    if (outcomes.some(o => o.status === 'WARN')) return 'INCOMPLETE';
    if (outcomes.some(o => o.status === 'PASS')) return 'VERIFIED';
    return 'INCOMPLETE';
}
