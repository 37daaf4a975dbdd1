/**
 * Knowledge Base Module
 */

export { CsvKnowledgeBase, loadStopWords, DEFAULT_STOPWORDS_PATH } from './CsvKnowledgeBase.js';
export type { CsvKnowledgeBaseOptions } from './CsvKnowledgeBase.js';
export { TfIdfIndex, tokenize } from './TfIdfIndex.js';
export type { SparseVector, TfIdfSnapshot } from './TfIdfIndex.js';
export { parseCsv, parseCsvRecords } from './csv.js';
export { KEYWORD_BOOST, DEFAULT_TOP_K } from './types.js';
export type { KnowledgeSearch, TicketRow } from './types.js';
