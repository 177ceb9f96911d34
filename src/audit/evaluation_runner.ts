import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { errorMessage } from '../utils/errors';
import { evaluatePredictions, groundTruthSchema, predictionSchema } from './evaluation';

function readJson(filePath: string): unknown {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

async function runEvaluation() {
    const { values, positionals } = parseArgs({
        allowPositionals: true,
        options: { output: { type: 'string', short: 'o' } },
    });

    const [groundTruthPath, reportsPath] = positionals;
    if (!groundTruthPath || !reportsPath) {
        console.error('Usage: evaluation_runner <ground-truth.json> <reports.json> [--output evaluation.json]');
        process.exitCode = 1;
        return;
    }

    const groundTruth = groundTruthSchema.parse(readJson(groundTruthPath));
    const predictions = predictionSchema.parse(readJson(reportsPath));
    const result = evaluatePredictions(groundTruth, predictions);

    console.log("\n--- Evaluation Results ---");
    console.log(`Persons: ${result.counts.matchedPersons}/${result.counts.groundTruth} matched, ${result.counts.missingPredictions} missing`);
    console.log(`Person-level accuracy: ${(result.personLevelAccuracy * 100).toFixed(2)}%`);
    console.log(`Rule-level accuracy: ${(result.ruleLevelAccuracy * 100).toFixed(2)}% (${result.counts.correctRuleChecks}/${result.counts.totalRuleChecks})`);
    for (const [ruleId, entry] of Object.entries(result.ruleAccuracy)) {
        console.log(`  ${ruleId}: ${(entry.accuracy * 100).toFixed(2)}% (${entry.correct}/${entry.total})`);
    }

    if (values.output) {
        const outputPath = path.resolve(values.output);
        fs.mkdirSync(path.dirname(outputPath), { recursive: true });
        fs.writeFileSync(outputPath, JSON.stringify(result, null, 2));
        console.log(`\nDetailed evaluation saved to: ${outputPath}`);
    }
}

if (require.main === module) {
    runEvaluation().catch(err => {
        console.error('[Evaluation] Failed:', errorMessage(err));
        process.exitCode = 1;
    });
}
