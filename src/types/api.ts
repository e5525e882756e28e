/**
 * TTKIA API Response Types
 *
 * zod schemas for every endpoint body the client decodes. Objects are
 * declared with passthrough() so fields the server adds later survive
 * decoding; only the fields the SDK reads are checked.
 */
import { z } from "zod";

// ============================================================================
// Shared
// ============================================================================

/** A document, link or web page the assistant cited */
export const ReferenceSchema = z
  .object({
    title: z.string().optional(),
    source: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

export type Reference = z.infer<typeof ReferenceSchema>;

const IdSchema = z.union([z.string(), z.number()]);

// ============================================================================
// Session & Workspace
// ============================================================================

/** Body of POST /env; its content is server-defined */
export const EnvironmentInfoSchema = z.record(z.string(), z.unknown());

export type EnvironmentInfo = z.infer<typeof EnvironmentInfoSchema>;

export const WorkspaceSchema = z
  .object({
    conversation_id: z.string().min(1),
  })
  .passthrough();

export type Workspace = z.infer<typeof WorkspaceSchema>;

export const ConversationSummarySchema = z
  .object({
    conversation_id: z.string().optional(),
    title: z.string().optional(),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
  })
  .passthrough();

export type ConversationSummary = z.infer<typeof ConversationSummarySchema>;

/** Body of GET /auth/users/me */
export const UserProfileSchema = z
  .object({
    username: z.string().optional(),
    history_chat: z
      .object({
        conversations: z.array(ConversationSummarySchema).default([]),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type UserProfile = z.infer<typeof UserProfileSchema>;

// ============================================================================
// Conversation
// ============================================================================

export const AttachmentSchema = z
  .object({
    id: IdSchema.optional(),
    name: z.string().optional(),
    size: z.number().optional(),
    status: z.string().optional(),
  })
  .passthrough();

export type Attachment = z.infer<typeof AttachmentSchema>;

export const ConversationMessageSchema = z
  .object({
    role: z.string().optional(),
    content: z.string().optional(),
    timestamp: z.string().optional(),
  })
  .passthrough();

export type ConversationMessage = z.infer<typeof ConversationMessageSchema>;

/** Body of POST /conversation-info */
export const ConversationDetailsSchema = z
  .object({
    conversation_id: z.string().optional(),
    title: z.string().optional(),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
    messages: z.array(ConversationMessageSchema).default([]),
    file_attachments: z.array(AttachmentSchema).default([]),
  })
  .passthrough();

export type ConversationDetails = z.infer<typeof ConversationDetailsSchema>;

/** Body of POST /chat-upload */
export const UploadResultSchema = z
  .object({
    id: IdSchema.optional(),
    name: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();

export type UploadResult = z.infer<typeof UploadResultSchema>;

// ============================================================================
// Configuration Options
// ============================================================================

/** A response style or prompt the server offers */
export const OptionSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

export type Option = z.infer<typeof OptionSchema>;

/** GET /get_styles answers either a bare list or `{ styles: [...] }` */
export const StylesResponseSchema = z.union([
  z.array(OptionSchema),
  z.object({ styles: z.array(OptionSchema) }).transform((body) => body.styles),
]);

/** GET /get_prompts answers either a bare list or `{ prompts: [...] }` */
export const PromptsResponseSchema = z.union([
  z.array(OptionSchema),
  z.object({ prompts: z.array(OptionSchema) }).transform((body) => body.prompts),
]);

export const SourceSchema = z
  .object({
    title: z.string().optional(),
  })
  .passthrough();

export type Source = z.infer<typeof SourceSchema>;

export const SourcesResponseSchema = z.array(SourceSchema);

// ============================================================================
// Query
// ============================================================================

export type AttachedFile = Record<string, unknown>;
export type AttachedUrl = Record<string, unknown>;

/** Request body of POST /query_complete */
export interface QueryPayload {
  query: string;
  conversation_id: string | null;
  prompt: string;
  style: string;
  teacher_mode: boolean;
  sources: string[];
  attached_files: AttachedFile[];
  attached_urls: AttachedUrl[];
  web_search: boolean;
  title: string;
}

/** Body of POST /query_complete */
export const QueryResponseSchema = z
  .object({
    response_text: z.string(),
    docs: z.array(ReferenceSchema).default([]),
    webs: z.array(ReferenceSchema).default([]),
    links: z.array(ReferenceSchema).default([]),
    confidence: z.number().optional(),
    teacher_mode_active: z.boolean().optional(),
    conversation_id: z.string().nullish(),
    message_id: IdSchema.optional(),
    query: z.string().optional(),
    query_extended: z.string().optional(),
    thinking_process: z.array(z.unknown()).default([]),
    inferred_environments: z.array(z.string()).default([]),
  })
  .passthrough();

export type QueryResponse = z.infer<typeof QueryResponseSchema>;
