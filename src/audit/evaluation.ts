import { z } from 'zod';

export const groundTruthSchema = z.array(z.object({
    personId: z.string().min(1),
    overallStatus: z.string().min(1),
    // ruleId -> expected status
    rules: z.record(z.string(), z.string()).default({}),
}));

export type GroundTruthEntry = z.infer<typeof groundTruthSchema>[number];

export const predictionSchema = z.array(z.object({
    personId: z.string().min(1),
    overallStatus: z.string().min(1),
    outcomes: z.array(z.object({ ruleId: z.string(), status: z.string() })).default([]),
}));

/** Any report-shaped object; PersonVerificationReport qualifies. */
export interface Prediction {
    personId: string;
    overallStatus: string;
    outcomes: readonly { ruleId: string; status: string }[];
}

export interface RuleAccuracy {
    correct: number;
    total: number;
    accuracy: number;
}

export type EvaluationDetail =
    | { personId: string; type: 'MISSING_PREDICTION' }
    | { personId: string; type: 'OVERALL_STATUS_MISMATCH'; expected: string; actual: string }
    | { personId: string; type: 'RULE_MISMATCH'; ruleId: string; expected: string; actual: string | null };

export interface EvaluationResult {
    /** Correct rule checks over all rule checks present on both sides. */
    ruleLevelAccuracy: number;
    /** Persons whose overall status matched, over all ground-truth persons. */
    personLevelAccuracy: number;
    ruleAccuracy: Record<string, RuleAccuracy>;
    counts: {
        groundTruth: number;
        predictions: number;
        matchedPersons: number;
        missingPredictions: number;
        correctPersons: number;
        totalRuleChecks: number;
        correctRuleChecks: number;
    };
    details: EvaluationDetail[];
}

const LABEL_ALIASES = new Map<string, string>([
    ['pass', 'PASS'], ['passed', 'PASS'], ['ok', 'PASS'], ['true', 'PASS'], ['success', 'PASS'],
    ['fail', 'FAIL'], ['failed', 'FAIL'], ['false', 'FAIL'], ['invalid', 'FAIL'],
    ['warn', 'WARN'], ['warning', 'WARN'],
    ['verified', 'VERIFIED'],
    ['rejected', 'REJECTED'],
    ['incomplete', 'INCOMPLETE'], ['pending', 'INCOMPLETE'],
]);

/** Hand-labelled ground truth uses many spellings; fold them onto the report's enums. */
export function normalizeStatusLabel(label: string): string {
    const key = label.trim().toLowerCase();
    return LABEL_ALIASES.get(key) ?? key.toUpperCase();
}

function ratio(correct: number, total: number): number {
    return total > 0 ? correct / total : 0;
}

/**
 * Compares produced reports against hand-labelled expectations. A rule
 * missing from the prediction is reported but not counted as a check.
 */
export function evaluatePredictions(groundTruth: readonly GroundTruthEntry[], predictions: readonly Prediction[]): EvaluationResult {
    const truthByPerson = new Map(groundTruth.map(entry => [entry.personId, entry]));
    const predictionByPerson = new Map(predictions.map(p => [p.personId, p]));

    const ruleAccuracy: Record<string, RuleAccuracy> = {};
    const details: EvaluationDetail[] = [];
    let matchedPersons = 0;
    let correctPersons = 0;
    let totalRuleChecks = 0;
    let correctRuleChecks = 0;

    for (const [personId, truth] of truthByPerson) {
        const prediction = predictionByPerson.get(personId);
        if (!prediction) {
            details.push({ personId, type: 'MISSING_PREDICTION' });
            continue;
        }
        matchedPersons++;

        const expectedStatus = normalizeStatusLabel(truth.overallStatus);
        const actualStatus = normalizeStatusLabel(prediction.overallStatus);
        if (expectedStatus === actualStatus) {
            correctPersons++;
        } else {
            details.push({ personId, type: 'OVERALL_STATUS_MISMATCH', expected: expectedStatus, actual: actualStatus });
        }

        const predicted = new Map(prediction.outcomes.map(o => [o.ruleId, normalizeStatusLabel(o.status)]));
        for (const [ruleId, label] of Object.entries(truth.rules)) {
            const expected = normalizeStatusLabel(label);
            const actual = predicted.get(ruleId) ?? null;
            if (actual === null) {
                details.push({ personId, type: 'RULE_MISMATCH', ruleId, expected, actual });
                continue;
            }

            const entry = ruleAccuracy[ruleId] ?? { correct: 0, total: 0, accuracy: 0 };
            entry.total++;
            totalRuleChecks++;
            if (actual === expected) {
                entry.correct++;
                correctRuleChecks++;
            } else {
                details.push({ personId, type: 'RULE_MISMATCH', ruleId, expected, actual });
            }
            entry.accuracy = ratio(entry.correct, entry.total);
            ruleAccuracy[ruleId] = entry;
        }
    }

    return {
        ruleLevelAccuracy: ratio(correctRuleChecks, totalRuleChecks),
        personLevelAccuracy: ratio(correctPersons, truthByPerson.size),
        ruleAccuracy,
        counts: {
            groundTruth: truthByPerson.size,
            predictions: predictionByPerson.size,
            matchedPersons,
            missingPredictions: truthByPerson.size - matchedPersons,
            correctPersons,
            totalRuleChecks,
            correctRuleChecks,
        },
        details,
    };
}
