/**
 * Schema exports for @apiprobe/core
 */

export {
  PayloadSchema,
  HeadersSchema,
  QuestCaseSchema,
  QuestDocumentSchema,
  ExpectedResultSchema,
  EndpointPayloadSchema,
  EndpointSchema,
  EndpointsDocumentSchema,
} from './config.js';

export type {
  QuestCase,
  QuestDocument,
  ExpectedResult,
  EndpointDefinition,
  EndpointsDocument,
} from './config.js';
