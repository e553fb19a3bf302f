// Orchestrator Module - Main exports

export { QuestionAnswerer, createQuestionAnswerer, EMPTY_QUESTION_REPLY } from './orchestrator.js';
export type { CreateQuestionAnswererOptions } from './orchestrator.js';
export type { AnswerDetails, AnswerSource, Dispatcher, QuestionAnswererOptions, Responder } from './types.js';
