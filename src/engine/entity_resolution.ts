import {
    FIELD_NAMES,
    type DiscardedCandidate,
    type FieldName,
    type NormalizedField,
    type ReconciledField,
    type ReconciledFields,
    type VerificationDocument,
} from '../types/verification_types';
import { ReconciliationConflict } from '../utils/errors';
import { normalizeCandidate, type NormalizationContext } from '../utils/normalization';
import { canonicalKey, valueSimilarity } from '../utils/similarity';

/**
 * Fields compared by token overlap. Everything else must match exactly.
 */
export const FUZZY_FIELDS: ReadonlySet<FieldName> = new Set<FieldName>(['NAME', 'GUARDIAN_NAME', 'ADDRESS']);

export interface ResolutionContext extends NormalizationContext {
    fuzzyMatchThreshold: number;
}

export interface PersonResolution {
    reconciledFields: ReconciledFields;
    discarded: DiscardedCandidate[];
    conflicts: ReconciliationConflict[];
}

interface RankedField {
    field: NormalizedField;
    order: number;
}

interface CandidateGroup {
    members: RankedField[];
    best: RankedField;
}

/**
 * Heuristic to determine if two normalized values describe the same thing.
 */
export function isSameValue(a: NormalizedField, b: NormalizedField, threshold: number): boolean {
    if (FUZZY_FIELDS.has(a.fieldName)) {
        return valueSimilarity(a.canonicalValue, b.canonicalValue) >= threshold;
    }
    return canonicalKey(a.canonicalValue) === canonicalKey(b.canonicalValue);
}

// Higher confidence wins; on a tie the earlier ingested candidate wins.
function outranks(incoming: RankedField, current: RankedField): boolean {
    if (incoming.field.confidence !== current.field.confidence) {
        return incoming.field.confidence > current.field.confidence;
    }
    return incoming.order < current.order;
}

function compareGroups(a: CandidateGroup, b: CandidateGroup): number {
    if (a.members.length !== b.members.length) return b.members.length - a.members.length;
    if (a.best.field.confidence !== b.best.field.confidence) return b.best.field.confidence - a.best.field.confidence;
    return a.best.order - b.best.order;
}

/**
 * Picks one authoritative value out of every surviving candidate for a field.
 * `fields` must be in ingestion order. Returns null when nothing survived.
 */
export function reconcileField(fieldName: FieldName, fields: NormalizedField[], threshold: number): ReconciledField | null {
    if (fields.length === 0) return null;

    const groups: CandidateGroup[] = [];
    fields.forEach((field, order) => {
        const ranked: RankedField = { field, order };
        const home = groups.find(g => isSameValue(g.members[0].field, field, threshold));
        if (home) {
            home.members.push(ranked);
            if (outranks(ranked, home.best)) home.best = ranked;
        } else {
            groups.push({ members: [ranked], best: ranked });
        }
    });

    groups.sort(compareGroups);
    const winner = groups[0];

    return {
        field: winner.best.field,
        conflicted: winner.members.length * 2 <= fields.length,
        supportingCount: winner.members.length,
        candidateCount: fields.length,
        candidates: fields,
        groups: groups.map(g => g.best.field.canonicalValue),
    };
}

/**
 * Normalizes every candidate of every document (document order, then
 * candidate order) and reconciles them field by field.
 */
export function reconcilePerson(personId: string, documents: VerificationDocument[], ctx: ResolutionContext): PersonResolution {
    const survivors = new Map<FieldName, NormalizedField[]>();
    const discarded: DiscardedCandidate[] = [];

    for (const doc of documents) {
        for (const candidate of doc.fieldCandidates) {
            const result = normalizeCandidate(candidate, doc.documentId, ctx);
            if (result.ok) {
                const list = survivors.get(candidate.fieldName) ?? [];
                list.push(result.field);
                survivors.set(candidate.fieldName, list);
            } else {
                discarded.push({
                    fieldName: candidate.fieldName,
                    rawValue: candidate.rawValue,
                    sourceDocumentId: doc.documentId,
                    sourceProvider: candidate.sourceProvider,
                    errorKind: result.error.kind,
                    message: result.error.message,
                });
            }
        }
    }

    const reconciledFields: ReconciledFields = {};
    const conflicts: ReconciliationConflict[] = [];

    for (const fieldName of FIELD_NAMES) {
        const reconciled = reconcileField(fieldName, survivors.get(fieldName) ?? [], ctx.fuzzyMatchThreshold);
        if (!reconciled) continue;
        reconciledFields[fieldName] = reconciled;

        if (reconciled.conflicted) {
            const conflict = new ReconciliationConflict(personId, fieldName, reconciled.groups, reconciled.field.canonicalValue);
            conflicts.push(conflict);
            console.warn(`[EntityResolution] ${personId}: ${conflict.message}`);
        }
    }

    if (discarded.length > 0) {
        console.log(`[EntityResolution] ${personId}: discarded ${discarded.length} candidate(s) that failed normalization.`);
    }

    return { reconciledFields, discarded, conflicts };
}
