import type { CanonicalValue, FieldName, NormalizationErrorKind } from '../types/verification_types';

export class NormalizationError extends Error {
    constructor(
        public readonly kind: NormalizationErrorKind,
        public readonly fieldName: FieldName,
        public readonly rawValue: string,
        message: string
    ) {
        super(message);
        this.name = 'NormalizationError';
    }
}

/**
 * Non-fatal: emitted when no candidate group holds a strict majority.
 * Carried as evidence and as an event, never thrown.
 */
export class ReconciliationConflict {
    constructor(
        public readonly personId: string,
        public readonly fieldName: FieldName,
        public readonly groups: CanonicalValue[],
        public readonly chosen: CanonicalValue
    ) { }

    get message(): string {
        return `${this.fieldName} has ${this.groups.length} disagreeing candidate groups without a strict majority`;
    }
}

export class ProviderUnavailableError extends Error {
    constructor(public readonly provider: string, message: string) {
        super(message);
        this.name = 'ProviderUnavailableError';
    }
}

export class ProviderTimeoutError extends Error {
    constructor(public readonly provider: string, public readonly timeoutMs: number) {
        super(`${provider} did not respond within ${timeoutMs}ms`);
        this.name = 'ProviderTimeoutError';
    }
}

export class InvalidRuleDefinitionError extends Error {
    constructor(public readonly ruleId: string, message: string) {
        super(`Invalid rule "${ruleId}": ${message}`);
        this.name = 'InvalidRuleDefinitionError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
