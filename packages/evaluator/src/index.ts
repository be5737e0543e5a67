/**
 * @routebench/evaluator
 *
 * Scores routing batches, repeats them across runs and topologies,
 * and renders the comparison.
 */

export { isCorrectRouting, summarize, mean } from './scoring.js';
export { runBatch, runQuery, type BatchOptions } from './batch-runner.js';
export { runExperiment, type ExperimentOptions } from './experiment.js';
export {
    ACCURACY_TIE_THRESHOLD,
    accuracyWinner,
    aggregate,
    collectMisroutes,
    computeStats,
    lowestMean,
} from './aggregator.js';
export { formatAccuracy, formatHops, formatLatency, formatMetrics } from './format.js';
export {
    renderComparisonTable,
    renderMisrouteTable,
    renderResultLine,
    renderResultLines,
    renderRunTable,
} from './report.js';
export { buildComparisonCsv, escapeCsvField, writeComparisonCsv } from './csv.js';
