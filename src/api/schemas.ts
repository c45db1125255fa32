import { z } from 'zod';
import { commonSchemas } from '../middleware/validation';

export const QueryRequestSchema = z.object({
  query: commonSchemas.query,
  session_id: commonSchemas.sessionId.optional(),
});

export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export const DirectQueryRequestSchema = z.object({
  query: commonSchemas.query,
  mode: commonSchemas.retrievalMode.default('hybrid'),
  session_id: commonSchemas.sessionId.optional(),
});

export type DirectQueryRequest = z.infer<typeof DirectQueryRequestSchema>;

export const DocumentSchema = z.object({
  text: z.string().trim().min(1, 'Document text cannot be empty').max(1_000_000, 'Document too long'),
  title: z.string().max(500).optional(),
  source: z.string().max(2000).optional(),
});

export const AddDocumentRequestSchema = DocumentSchema.extend({
  session_id: commonSchemas.sessionId.optional(),
});

export type AddDocumentRequest = z.infer<typeof AddDocumentRequestSchema>;

export const BatchAddDocumentsRequestSchema = z.object({
  documents: z.array(DocumentSchema).min(1, 'At least one document is required').max(100, 'Too many documents (max 100)'),
  session_id: commonSchemas.sessionId.optional(),
});

export type BatchAddDocumentsRequest = z.infer<typeof BatchAddDocumentsRequestSchema>;

export const SessionParamsSchema = z.object({
  sessionId: commonSchemas.sessionId,
});
