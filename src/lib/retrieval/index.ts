export { RetrievalAnswerEngine } from './answer-engine';
export type { AnswerEngineDeps, QueryContext } from './answer-engine';
export { keywordSearch, queryTerms } from './keyword';
export { citedMarkers, stripInvalidMarkers } from './citations';
