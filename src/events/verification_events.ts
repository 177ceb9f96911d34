import { EventEmitter } from 'events';
import type { ExtractionAttempt } from '../types/extraction_types';
import type { DocumentType, OverallStatus, PersonVerificationReport } from '../types/verification_types';
import type { ReconciliationConflict } from '../utils/errors';

export interface DocumentFailedEvent {
    personId: string;
    documentId: string;
    documentType: DocumentType;
    reason: string;
    attempts: ExtractionAttempt[];
}

export interface BatchCompletedEvent {
    persons: number;
    durationMs: number;
    statusCounts: Record<OverallStatus, number>;
}

export interface VerificationEvents {
    'report.created': PersonVerificationReport;
    'field.conflicted': ReconciliationConflict;
    'document.failed': DocumentFailedEvent;
    'batch.completed': BatchCompletedEvent;
}

export type VerificationEventName = keyof VerificationEvents;

class VerificationEmitter extends EventEmitter {
    emitEvent<K extends VerificationEventName>(name: K, payload: VerificationEvents[K]) {
        this.emit(name, payload);
    }

    subscribe<K extends VerificationEventName>(name: K, callback: (payload: VerificationEvents[K]) => void) {
        this.on(name, callback);
        return () => this.off(name, callback);
    }
}

export const verificationEmitter = new VerificationEmitter();
