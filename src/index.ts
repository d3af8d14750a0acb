export { IgnoreFilter, parseIgnoreRules } from './ignore-filter.js';
export { walkRepo, isTextFile, TEXT_EXTENSIONS } from './scanner.js';
export { withRetry, retryPolicyFromConfig, fixedDelay, type RetryPolicy } from './retry.js';
export { loadConfig, writeExampleConfig, type SummarizerConfig } from './config.js';
export { OpenAISummaryClient, classifyApiError, type SummaryClient, type SummaryRequest } from './summarizer/client.js';
export { FileSummarizer, type Summarizer } from './summarizer/summarizer.js';
export { summarizeRepo, readTextFile } from './summarizer/processor.js';
export { buildTree, flattenTree } from './tree/builder.js';
export { renderTree, renderTreeText, formatRenderLine, flattenSummary } from './tree/renderer.js';
export { serializeTree, parseTree, writeTreeJson, loadTreeJson, writeTreeText, printTree } from './output.js';
export { runSummarize } from './commands/summarize.js';
export { runRender } from './commands/render.js';
export * from './errors.js';
export type * from './types.js';
