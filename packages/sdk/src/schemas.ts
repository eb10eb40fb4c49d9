/**
 * Zod schemas for tool inputs and backend responses
 *
 * Input schemas check presence and type of the base arguments only. Revision,
 * pagination, selector and index arguments are passed through as unknown and
 * validated by their own components, which report a specific sub-kind.
 */

import { z } from "zod";

function requiredString(name: string) {
  return z
    .string({
      required_error: `${name} is required`,
      invalid_type_error: `${name} must be a string`,
    })
    .min(1, `${name} must be non-empty`);
}

const DatabaseSchema = requiredString("database");
const DocIdSchema = requiredString("doc_id");

// Document schema - any JSON object; reserved metadata fields must be strings when present
export const DocumentSchema = z
  .object(
    {
      _id: z.string().min(1, "_id must be non-empty").optional(),
      _rev: z.string().optional(),
    },
    {
      required_error: "document is required",
      invalid_type_error: "document must be a JSON object",
    }
  )
  .passthrough();

// Tool input schemas

export const ListDatabasesInputSchema = z.object({});

export const DatabaseLifecycleInputSchema = z.object({
  name: requiredString("name"),
});

export const CreateDocumentInputSchema = z.object({
  database: DatabaseSchema,
  document: DocumentSchema,
  doc_id: requiredString("doc_id").optional(),
});

export const GetDocumentInputSchema = z.object({
  database: DatabaseSchema,
  doc_id: DocIdSchema,
});

export const UpdateDocumentInputSchema = z.object({
  database: DatabaseSchema,
  doc_id: DocIdSchema,
  document: DocumentSchema,
  rev: z.unknown().optional(),
});

export const DeleteDocumentInputSchema = z.object({
  database: DatabaseSchema,
  doc_id: DocIdSchema,
  rev: z.unknown().optional(),
});

export const ListDocumentsInputSchema = z.object({
  database: DatabaseSchema,
  limit: z.unknown().optional(),
  skip: z.unknown().optional(),
  include_docs: z.boolean({ invalid_type_error: "include_docs must be a boolean" }).optional(),
});

export const SearchDocumentsInputSchema = z.object({
  database: DatabaseSchema,
  query: z.unknown().refine((v) => v !== undefined, "query is required"),
  limit: z.unknown().optional(),
  skip: z.unknown().optional(),
  fields: z
    .array(z.string().min(1), { invalid_type_error: "fields must be an array of field names" })
    .optional(),
});

export const CreateIndexInputSchema = z.object({
  database: DatabaseSchema,
  fields: z.unknown().optional(),
  index_name: z.unknown().optional(),
  type: z.unknown().optional(),
});

export const ListIndexesInputSchema = z.object({
  database: DatabaseSchema,
});

// Backend response schemas

export const CouchErrorBodySchema = z
  .object({
    error: z.string().optional(),
    reason: z.string().optional(),
  })
  .passthrough();

export const OkResponseSchema = z.object({ ok: z.literal(true) }).passthrough();

export const AllDbsResponseSchema = z.array(z.string());

export const WriteResponseSchema = z
  .object({
    ok: z.boolean().optional(),
    id: z.string(),
    rev: z.string(),
  })
  .passthrough();

export const AllDocsRowSchema = z
  .object({
    id: z.string(),
    key: z.unknown(),
    value: z.unknown(),
    doc: DocumentSchema.nullable().optional(),
  })
  .passthrough();

export const AllDocsResponseSchema = z
  .object({
    total_rows: z.number().optional(),
    offset: z.number().nullable().optional(),
    rows: z.array(AllDocsRowSchema),
  })
  .passthrough();

export const FindResponseSchema = z
  .object({
    docs: z.array(DocumentSchema),
    warning: z.string().optional(),
  })
  .passthrough();

export const CreateIndexResponseSchema = z
  .object({
    result: z.string(),
    id: z.string().optional(),
    name: z.string().optional(),
  })
  .passthrough();

export const ListIndexesResponseSchema = z
  .object({
    total_rows: z.number().optional(),
    indexes: z.array(z.record(z.string(), z.unknown())),
  })
  .passthrough();

// Export types
export type DocumentInput = z.infer<typeof DocumentSchema>;
export type CreateDocumentInput = z.infer<typeof CreateDocumentInputSchema>;
export type UpdateDocumentInput = z.infer<typeof UpdateDocumentInputSchema>;
export type DeleteDocumentInput = z.infer<typeof DeleteDocumentInputSchema>;
export type ListDocumentsInput = z.infer<typeof ListDocumentsInputSchema>;
export type SearchDocumentsInput = z.infer<typeof SearchDocumentsInputSchema>;
export type CreateIndexInput = z.infer<typeof CreateIndexInputSchema>;
export type AllDocsResponse = z.infer<typeof AllDocsResponseSchema>;
export type FindResponse = z.infer<typeof FindResponseSchema>;
