/**
 * @founder-finder/core — parsing, evaluation and reporting
 */

export {
  pipelineError,
  ok,
  fail,
  describeError,
  type PipelineError,
  type Result,
} from './errors.js';
export {
  parseCompanyLine,
  parseCompanyList,
  type ParsedLine,
  type CompanyListParseResult,
} from './company-list.js';
export { extractSnippets, extractSnippetsFromJson, RESULTS_FIELD } from './snippets.js';
export { parseFounderList } from './founder-list.js';
export { sanitizeCompanyName, searchArtifactPath } from './sanitize.js';
export { ResultStore } from './result-store.js';
export { evaluateAccuracy, summarizeAccuracy } from './accuracy.js';
export { renderAccuracyReport, renderMismatches, NO_DATA_MESSAGE } from './report.js';
